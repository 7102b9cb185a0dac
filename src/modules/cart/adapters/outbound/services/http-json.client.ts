import type { z } from "zod";
import type { Logger } from "../../../../shared/infra/logger.js";

export class UpstreamServiceError extends Error {
  readonly status: number | null;

  constructor(
    readonly service: string,
    message: string,
    options: { cause?: unknown; status?: number } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "UpstreamServiceError";
    this.status = options.status ?? null;
  }
}

export type HttpJsonClient = {
  /** Resolves to null on 404. */
  get<T>(path: string, schema: z.ZodType<T>): Promise<T | null>;
  post<T>(path: string, body: unknown, schema: z.ZodType<T>): Promise<T>;
};

/**
 * Minimal JSON client for the collaborating services. Every call carries a
 * timeout signal and every response body is validated.
 */
export function createHttpJsonClient({
  service,
  baseUrl,
  timeoutMs,
  logger,
}: {
  service: string;
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
}): HttpJsonClient {
  async function request<T>(
    method: "GET" | "POST",
    path: string,
    schema: z.ZodType<T>,
    body?: unknown,
  ): Promise<T | null> {
    const url = new URL(path, baseUrl);
    const startedAt = Date.now();
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          Accept: "application/json",
          ...(body === undefined ? {} : { "Content-Type": "application/json" }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new UpstreamServiceError(
        service,
        `${method} ${url.pathname} failed`,
        { cause: error },
      );
    }
    logger.debug(
      {
        service,
        method,
        path: url.pathname,
        status: response.status,
        durationMs: Date.now() - startedAt,
      },
      "http-client.response",
    );
    if (response.status === 404) return null;
    if (!response.ok) {
      throw new UpstreamServiceError(
        service,
        `${method} ${url.pathname} returned ${response.status}`,
        { status: response.status },
      );
    }
    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new UpstreamServiceError(
        service,
        `${method} ${url.pathname} returned an unreadable body`,
        { cause: error, status: response.status },
      );
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new UpstreamServiceError(
        service,
        `${method} ${url.pathname} returned an unexpected body`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  return {
    get: (path, schema) => request("GET", path, schema),
    async post(path, body, schema) {
      const result = await request("POST", path, schema, body);
      if (result === null) {
        throw new UpstreamServiceError(service, `POST ${path} returned 404`, {
          status: 404,
        });
      }
      return result;
    },
  };
}
