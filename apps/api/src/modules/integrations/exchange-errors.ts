export type OrderErrorClass = "benign-absence" | "transient";

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function sanitizeExchangeErrorMessage(rawMessage: string): string {
  const trimmed = rawMessage.trim();
  if (!trimmed) return "Unknown exchange error";

  const withoutQuery = trimmed
    .replace(/https?:\/\/\S+/gi, (url) => {
      const q = url.indexOf("?");
      return q >= 0 ? `${url.slice(0, q)}?<redacted>` : url;
    })
    .replace(/signature=[a-fA-F0-9]+/g, "signature=<redacted>")
    .replace(/timestamp=\d+/g, "timestamp=<redacted>");

  return withoutQuery.length > 220 ? `${withoutQuery.slice(0, 220)}…` : withoutQuery;
}

function isOrderNotFound(err: unknown): boolean {
  if (err instanceof Error && err.name === "OrderNotFound") return true;
  return errorMessage(err).toLowerCase().includes("not found");
}

// The order is gone either way: cancelled elsewhere, filled, or never existed.
export function classifyCancelError(err: unknown): OrderErrorClass {
  if (isOrderNotFound(err)) return "benign-absence";
  return errorMessage(err).toLowerCase().includes("already") ? "benign-absence" : "transient";
}

export function classifyStatusQueryError(err: unknown): OrderErrorClass {
  return isOrderNotFound(err) ? "benign-absence" : "transient";
}
