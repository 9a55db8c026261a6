/**
 * Route build error taxonomy
 *
 * Every failure of a build surfaces as one of these. None is recovered
 * inside the pipeline; the HTTP error handler maps them by statusCode/code.
 */

export class RouteBuildError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Routing service unreachable, timed out, or answered with a non-success status
 */
export class RoutingServiceError extends RouteBuildError {
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, 502, 'ROUTING_SERVICE_ERROR', status === undefined ? undefined : { status });
    this.status = status;
  }
}

/**
 * Routing service answered, but without the expected fields or shape
 */
export class MalformedResponseError extends RouteBuildError {
  constructor(message: string) {
    super(message, 502, 'MALFORMED_RESPONSE');
  }
}

export class OptimizationError extends RouteBuildError {
  constructor(message: string) {
    super(message, 422, 'OPTIMIZATION_ERROR');
  }
}

export class MissingWarehouseError extends RouteBuildError {
  constructor(name: string) {
    super(`Location '${name}' is required to center the map`, 400, 'MISSING_WAREHOUSE');
  }
}

export class InvalidLocationsError extends RouteBuildError {
  constructor(message: string, issues?: string[]) {
    super(message, 400, 'INVALID_LOCATIONS', issues ? { issues } : undefined);
  }
}
