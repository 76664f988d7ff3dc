/**
 * Page-side half of the bridge: send a command object, get the response
 * envelope back. Bundled into library/ by `npm run build` (and by `npm start`) so every
 * page served by the harness can load it from the lowest-priority root.
 */

export type Command = Record<string, unknown>;

export interface BridgeResponse {
  [key: string]: unknown;
  failed?: unknown;
  confirm?: string;
}

export interface FailedResponse extends BridgeResponse {
  failed: unknown;
}

export interface SendOptions {
  /** Defaults to the page's own origin. The path is ignored by the server. */
  url?: string;
  fetch?: typeof fetch;
  signal?: AbortSignal;
}

/** Non-200 answer: 400 empty command, 500 bad JSON, 501 handler fault. */
export class BridgeRequestError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Bridge answered ${status}: ${body}`);
    this.name = "BridgeRequestError";
    this.status = status;
    this.body = body;
  }
}

export function isFailure(response: BridgeResponse): response is FailedResponse {
  return "failed" in response;
}

function isResponseObject(value: unknown): value is BridgeResponse {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function sendCommand(command: Command, options: SendOptions = {}): Promise<BridgeResponse> {
  const doFetch = options.fetch ?? fetch;
  const res = await doFetch(options.url ?? "/", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(command),
    signal: options.signal,
  });
  const text = await res.text();
  if (res.status !== 200) throw new BridgeRequestError(res.status, text);

  const parsed: unknown = JSON.parse(text);
  if (!isResponseObject(parsed)) throw new BridgeRequestError(res.status, text);
  return parsed;
}

/** Ask the harness to confirm a page exists before navigating to it. */
export async function loadPage(page: string, options: SendOptions = {}): Promise<BridgeResponse> {
  return sendCommand({ load: page }, options);
}
