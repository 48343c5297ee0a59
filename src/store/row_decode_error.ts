export type RowDecodeErrorCode =
  | "missing_required_field"
  | "invalid_field"
  | "invalid_url";

export interface RowDecodeErrorDetails {
  code: RowDecodeErrorCode;
  message: string;
  entity: "client" | "tab" | "remote_device";
  field?: string;
  // Offending value, truncated to 100 chars
  value?: string;
}

export class RowDecodeError extends Error {
  public readonly code: RowDecodeErrorCode;
  public readonly details: RowDecodeErrorDetails;

  constructor(details: RowDecodeErrorDetails) {
    super(details.message);
    this.name = "RowDecodeError";
    this.code = details.code;
    this.details = {
      ...details,
      value: details.value?.substring(0, 100),
    };
  }

  toJSON() {
    return {
      error: "row_decode_failed",
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RowDecodeError };

export type RowDecoder<T> = (row: unknown) => DecodeResult<T>;

export type DecodeErrorPolicy = "skip" | "abort";
