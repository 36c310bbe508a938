export {
  buildKnowledgeBase,
  findNetworksRoot,
  loadNetworkFile,
  loadSampleNetwork,
  NetworkDescriptionSchema,
  parseNetwork,
  type LoadedNetwork,
} from "./loader.js";
