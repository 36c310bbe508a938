export { parseArgs, type ParsedArgs } from "./args.js";
