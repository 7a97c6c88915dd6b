/**
 * @vdi-assign/broker — HTTP Broker client.
 *
 * Talks to a broker's REST management endpoint with native fetch():
 * - API key header injection
 * - Request ID generation
 * - Timeout handling
 * - Error normalization into BrokerError codes
 * - Response validation (zod)
 *
 * No retries: a call either returns or throws, and the caller
 * records the outcome.
 */

import { z } from "zod";
import type { Machine, BrokerUser } from "@vdi-assign/types";
import type { Broker, BrokerErrorCode, HttpBrokerConfig } from "./types.js";
import { BrokerError } from "./types.js";

// =============================================================================
// Response Schemas
// =============================================================================

const MachineSchema = z.object({
  uid: z.string().min(1),
  machineName: z.string().min(1),
  desktopGroupName: z.string(),
});

const UserSchema = z.object({
  name: z.string().min(1),
});

const AssignedUsersSchema = z.array(z.string());

const ErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});

const DataEnvelopeSchema = z.object({
  data: z.unknown(),
});

// =============================================================================
// Internal Helpers
// =============================================================================

/** Generate a simple request ID */
function generateRequestId(): string {
  return `vdi-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Parse a response body as JSON, handling empty responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

function codeForStatus(status: number): BrokerErrorCode {
  if (status === 401) return "UNAUTHORIZED";
  if (status === 403) return "FORBIDDEN";
  if (status === 404) return "NOT_FOUND";
  if (status === 409) return "CONFLICT";
  if (status >= 400 && status < 500) return "INVALID_REQUEST";
  if (status >= 500) return "SERVER_ERROR";
  return "INVALID_RESPONSE";
}

function errorFromResponse(status: number, body: unknown): BrokerError {
  const envelope = ErrorEnvelopeSchema.safeParse(body);
  const message =
    envelope.success && envelope.data.error.message !== undefined
      ? envelope.data.error.message
      : `HTTP ${status}`;
  return new BrokerError(codeForStatus(status), message, status);
}

// =============================================================================
// HTTP Broker
// =============================================================================

export class HttpBroker implements Broker {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeout: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: HttpBrokerConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.timeout = config.timeout ?? 30000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async checkConnection(): Promise<void> {
    await this.request("GET", "/api/v1/session");
  }

  async findMachine(name: string): Promise<Machine | null> {
    return this.lookup(
      `/api/v1/machines?name=${encodeURIComponent(name)}`,
      MachineSchema,
    );
  }

  async findUser(name: string): Promise<BrokerUser | null> {
    return this.lookup(
      `/api/v1/users?name=${encodeURIComponent(name)}`,
      UserSchema,
    );
  }

  async listAssignedUsers(machineUid: string): Promise<readonly string[]> {
    const path = `/api/v1/machines/${encodeURIComponent(machineUid)}/users`;
    const { status, body } = await this.request("GET", path);
    return this.parseData(AssignedUsersSchema, body, path, status);
  }

  async assignUser(userName: string, machineUid: string): Promise<void> {
    await this.request(
      "POST",
      `/api/v1/machines/${encodeURIComponent(machineUid)}/users`,
      { userName },
    );
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  /**
   * GET a single record; a 404 means "no such record".
   */
  private async lookup<T>(
    path: string,
    schema: z.ZodType<T>,
  ): Promise<T | null> {
    try {
      const { status, body } = await this.request("GET", path);
      return this.parseData(schema, body, path, status);
    } catch (error) {
      if (error instanceof BrokerError && error.code === "NOT_FOUND") {
        return null;
      }
      throw error;
    }
  }

  private parseData<T>(
    schema: z.ZodType<T>,
    body: unknown,
    path: string,
    status: number,
  ): T {
    const envelope = DataEnvelopeSchema.safeParse(body);
    const result = schema.safeParse(envelope.success ? envelope.data.data : undefined);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new BrokerError(
        "INVALID_RESPONSE",
        `Malformed response from ${path.split("?")[0] ?? path} (${issues})`,
        status,
      );
    }
    return result.data;
  }

  private async request(
    method: string,
    path: string,
    body?: unknown,
  ): Promise<{ status: number; body: unknown }> {
    const headers: Record<string, string> = {
      "Accept": "application/json",
      "X-Request-Id": generateRequestId(),
    };

    if (this.apiKey !== undefined) {
      headers["X-Api-Key"] = this.apiKey;
    }

    const init: RequestInit = { method, headers };

    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(body);
    }

    const response = await this.fetchWithTimeout(`${this.baseUrl}${path}`, init);
    const responseBody = await parseResponseBody(response);

    if (!response.ok) {
      throw errorFromResponse(response.status, responseBody);
    }

    return { status: response.status, body: responseBody };
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new BrokerError(
          "TIMEOUT",
          `Request timed out after ${this.timeout}ms`,
        );
      }
      throw new BrokerError(
        "NETWORK_ERROR",
        error instanceof Error ? error.message : "Network error",
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
