export type DnsSwapErrorCode =
  | "DISCOVERY_FAILED"
  | "COMMAND_FAILED"
  | "INVALID_ADDRESS"
  | "INPUT_CLOSED"
  | "CONFIG_INVALID";

export class DnsSwapError extends Error {
  constructor(
    message: string,
    public code: DnsSwapErrorCode,
    public details?: unknown
  ) {
    super(message);
    this.name = "DnsSwapError";
  }
}

export function isDnsSwapError(err: unknown, code?: DnsSwapErrorCode): err is DnsSwapError {
  return err instanceof DnsSwapError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
