export type FormatErrorCode =
  | "INVALID_POINTER"
  | "SHORT_READ"
  | "SHORT_TABLE"
  | "UNKNOWN_TAG"
  | "TRAILING_BYTES"
  | "TRUNCATED_ROM"
  | "INVALID_PATCH"
  | "PATCH_OUT_OF_BOUNDS";

export type ConsistencyErrorCode =
  | "INCOHERENT_CHEST"
  | "DUPLICATE_LOCATION"
  | "UNKNOWN_LOCATION"
  | "UNKNOWN_ITEM"
  | "AREA_LOCK_VIOLATION"
  | "DESYNCHRONIZED_STATE"
  | "NO_OPEN_CHECKS"
  | "UNWRITTEN_CONDITIONAL"
  | "GAME_CONSUMED";

export type PolicyErrorCode =
  | "INVALID_ROM_SIZE"
  | "UNRECOGNIZED_ROM"
  | "UNSUPPORTED_REGION"
  | "INVALID_SEED"
  | "MISSING_PATCH"
  | "INVALID_CONFIG";

export type NeutopiaErrorCode = FormatErrorCode | ConsistencyErrorCode | PolicyErrorCode;

export class NeutopiaError extends Error {
  public constructor(
    public readonly code: NeutopiaErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** The bytes don't match the layout the parser expects. */
export class FormatError extends NeutopiaError {
  public constructor(
    public override readonly code: FormatErrorCode,
    message: string,
  ) {
    super(code, message);
  }

  /** Same error, with the location it was found at prefixed to the message. */
  public withContext(context: string): FormatError {
    return new FormatError(this.code, `${context}: ${this.message}`);
  }
}

/** Caller state or catalog data contradicts itself; a bug, not bad input. */
export class ConsistencyError extends NeutopiaError {
  public constructor(
    public override readonly code: ConsistencyErrorCode,
    message: string,
  ) {
    super(code, message);
  }
}

/** Input the tool refuses on purpose; the message says what to supply instead. */
export class PolicyError extends NeutopiaError {
  public constructor(
    public override readonly code: PolicyErrorCode,
    message: string,
  ) {
    super(code, message);
  }
}

export function hex(v: number, width = 2): string {
  return `0x${v.toString(16).padStart(width, "0")}`;
}

export type WarnFn = (msg: string) => void;
