/**
 * Error types raised by the knowledge base and the inference engine.
 *
 * Every error carries the station names or source involved as readonly fields.
 */

/** Base class for all linehop errors */
export class LinehopError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LinehopError";
  }
}

/** A referenced station name is not registered */
export class UnknownStationError extends LinehopError {
  readonly station: string;

  constructor(station: string) {
    super(`Unknown station: "${station}"`);
    this.name = "UnknownStationError";
    this.station = station;
  }
}

/** A station registration was rejected (empty name) */
export class InvalidStationError extends LinehopError {
  readonly station: string;

  constructor(station: string, reason: string) {
    super(`Invalid station "${station}": ${reason}`);
    this.name = "InvalidStationError";
    this.station = station;
  }
}

/** A connection registration was rejected; nothing was written */
export class InvalidConnectionError extends LinehopError {
  readonly from: string;
  readonly to: string;
  readonly reason: string;

  constructor(from: string, to: string, reason: string) {
    super(`Invalid connection ${from} -> ${to}: ${reason}`);
    this.name = "InvalidConnectionError";
    this.from = from;
    this.to = to;
    this.reason = reason;
  }
}

/**
 * A heuristic estimate was requested for a station without coordinates.
 * The inference engine recovers from this by using h = 0.
 */
export class MissingCoordinatesError extends LinehopError {
  readonly station: string;

  constructor(station: string) {
    super(`Station "${station}" has no coordinates`);
    this.name = "MissingCoordinatesError";
    this.station = station;
  }
}

/** Origin and destination are not connected */
export class RouteNotFoundError extends LinehopError {
  readonly origin: string;
  readonly destination: string;

  constructor(origin: string, destination: string) {
    super(`No route found between "${origin}" and "${destination}"`);
    this.name = "RouteNotFoundError";
    this.origin = origin;
    this.destination = destination;
  }
}

/** A network description failed validation */
export class NetworkLoadError extends LinehopError {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid network "${source}": ${issues.join("; ")}`);
    this.name = "NetworkLoadError";
    this.source = source;
    this.issues = issues;
  }
}

/** A routing configuration value is out of range */
export class InvalidConfigError extends LinehopError {
  readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid routing config "${field}": ${reason}`);
    this.name = "InvalidConfigError";
    this.field = field;
  }
}

/** A command-line argument is missing its value or otherwise unusable */
export class UsageError extends LinehopError {
  readonly argument: string;

  constructor(argument: string, reason: string) {
    super(`${argument}: ${reason}`);
    this.name = "UsageError";
    this.argument = argument;
  }
}
