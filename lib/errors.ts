export type ErrorType =
  | "bad_request"
  | "unauthorized"
  | "offline"
  | "bad_response";

export type Surface =
  | "narrator"
  | "character"
  | "damage"
  | "config"
  | "database";

export type ErrorCode = `${ErrorType}:${Surface}`;

const ERROR_TYPES: readonly ErrorType[] = [
  "bad_request",
  "unauthorized",
  "offline",
  "bad_response",
];

const SURFACES: readonly Surface[] = [
  "narrator",
  "character",
  "damage",
  "config",
  "database",
];

function isErrorType(value: string): value is ErrorType {
  return ERROR_TYPES.some((type) => type === value);
}

function isSurface(value: string): value is Surface {
  return SURFACES.some((surface) => surface === value);
}

export class GameError extends Error {
  readonly code: ErrorCode;
  readonly type: ErrorType;
  readonly surface: Surface;
  readonly detail?: string;

  constructor(
    errorCode: ErrorCode,
    options: { detail?: string; cause?: unknown } = {}
  ) {
    super(getMessageByErrorCode(errorCode), { cause: options.cause });
    this.name = "GameError";

    const [type, surface] = errorCode.split(":");
    if (!isErrorType(type) || !isSurface(surface)) {
      throw new TypeError(`Malformed error code: ${errorCode}`);
    }

    this.code = errorCode;
    this.type = type;
    this.surface = surface;
    this.detail = options.detail;
  }

  /**
   * Single line suitable for the console: the user-facing message followed
   * by the detail, when one was given.
   */
  toLogLine(): string {
    return this.detail
      ? `${this.code}: ${this.message} (${this.detail})`
      : `${this.code}: ${this.message}`;
  }
}

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

export function getMessageByErrorCode(errorCode: ErrorCode): string {
  if (errorCode.includes("database")) {
    return "An error occurred while recording the session.";
  }

  switch (errorCode) {
    case "bad_request:config":
      return "The narrator configuration is invalid.";
    case "bad_request:character":
      return "The character sheet is invalid.";
    case "bad_request:damage":
      return "Damage must be a non-negative whole number.";
    case "bad_request:narrator":
      return "The narrator could not handle this request.";

    case "unauthorized:narrator":
      return "The narration backend rejected the API key. Check AI_GATEWAY_API_KEY and try again.";

    case "offline:narrator":
      return "The narration backend could not be reached. Please try again.";

    case "bad_response:narrator":
      return "The narration backend returned an empty or malformed response.";

    default:
      return "Something went wrong. Please try again later.";
  }
}
