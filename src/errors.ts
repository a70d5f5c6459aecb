export type CotWireErrorCode =
  | "E_UNSUPPORTED_SCHEME"
  | "E_ADDRESS"
  | "E_BIND"
  | "E_CERTIFICATE"
  | "E_HANDSHAKE"
  | "E_PACKAGE"
  | "E_DEPENDENCY_MISSING"
  | "E_FRAME_TOO_LONG"
  | "E_CHANNEL_IO"
  | "E_CONFIG";

export class CotWireError extends Error {
  readonly code: CotWireErrorCode;

  constructor(
    code: CotWireErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.code = code;
    this.name = "CotWireError";
  }
}

export const isCotWireError = (
  err: unknown,
  code?: CotWireErrorCode,
): err is CotWireError =>
  err instanceof CotWireError && (code === undefined || err.code === code);

/** Node system errors carry an errno-style `code` string. */
export const errnoCode = (err: unknown): string | undefined => {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
};
