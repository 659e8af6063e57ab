// src/adapters/tyk/client.ts
import { z } from "zod";
import { TargetDefinition } from "../../model/target";
import { LookupError, TransportError, errorMessage } from "../../errors";
import { logger } from "../../utils/logger";

export type CreateOutcome =
  | { status: "created"; id?: string }
  | { status: "rejected"; httpStatus: number; body: string };

/**
 * Management API of the target gateway.
 * Both calls throw TransportError when the target cannot be reached;
 * `exists` throws LookupError when the answer cannot be interpreted.
 */
export interface TargetGatewayClient {
  exists(listenPath: string, signal?: AbortSignal): Promise<boolean>;
  create(definition: TargetDefinition, signal?: AbortSignal): Promise<CreateOutcome>;
}

export type TykClientOpts = {
  dashboardUrl: string;
  authToken: string;
  timeoutMs?: number;
};

const ApiListSchema = z.object({
  apis: z
    .array(
      z
        .object({
          api_definition: z
            .object({
              proxy: z.object({ listen_path: z.string().nullish() }).passthrough().nullish(),
            })
            .passthrough()
            .nullish(),
        })
        .passthrough()
    )
    .nullish(),
});

const CreateResponseSchema = z
  .object({
    Status: z.string().optional(),
    Message: z.string().optional(),
    Meta: z.unknown().optional(),
    ID: z.string().optional(),
  })
  .passthrough();

/** Client for the Tyk Dashboard API (`<dashboard>/api/...`). */
export class TykDashboardClient implements TargetGatewayClient {
  private readonly baseUrl: string;
  private readonly authToken: string;
  private readonly timeoutMs: number;

  constructor(opts: TykClientOpts) {
    this.baseUrl = `${opts.dashboardUrl.replace(/\/+$/, "")}/api`;
    this.authToken = opts.authToken;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
  }

  async exists(listenPath: string, signal?: AbortSignal): Promise<boolean> {
    const url = `${this.baseUrl}/apis?p=-1`;
    const { status, text } = await this.request(url, { method: "GET" }, signal);
    if (status < 200 || status >= 300) {
      throw new LookupError(url, status, truncate(text));
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new LookupError(url, status, "response is not JSON");
    }
    const parsed = ApiListSchema.safeParse(json);
    if (!parsed.success) {
      throw new LookupError(url, status, "unexpected response shape");
    }

    const apis = parsed.data.apis ?? [];
    return apis.some((a) => a.api_definition?.proxy?.listen_path === listenPath);
  }

  async create(definition: TargetDefinition, signal?: AbortSignal): Promise<CreateOutcome> {
    const url = `${this.baseUrl}/apis/oas`;
    const { status, text } = await this.request(
      url,
      { method: "POST", body: JSON.stringify(definition) },
      signal
    );

    let json: unknown = undefined;
    try {
      json = JSON.parse(text);
    } catch {
      logger.debug(`Non-JSON response from ${url}`);
    }
    const parsed = CreateResponseSchema.safeParse(json);
    if (status >= 200 && status < 300 && parsed.success && parsed.data.Status === "OK") {
      return { status: "created", id: parsed.data.ID ?? metaId(parsed.data.Meta) };
    }
    return { status: "rejected", httpStatus: status, body: text };
  }

  private async request(url: string, init: RequestInit, signal?: AbortSignal) {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(new Error(`timed out after ${this.timeoutMs}ms`)), this.timeoutMs);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });
    if (signal?.aborted) controller.abort(signal.reason);

    try {
      const response = await fetch(url, {
        ...init,
        signal: controller.signal,
        headers: {
          Authorization: this.authToken,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
      });
      const text = await response.text();
      logger.debug(`${init.method} ${url} -> ${response.status}`);
      return { status: response.status, text };
    } catch (err) {
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : err;
      throw new TransportError(url, errorMessage(reason), err);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

function metaId(meta: unknown): string | undefined {
  return typeof meta === "string" ? meta : undefined;
}

function truncate(s: string, max = 500) {
  return s.length > max ? `${s.slice(0, max)}...` : s;
}
