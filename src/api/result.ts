/**
 * Tagged outcome of a single remote call.
 *
 * Every response is classified exactly once, where it leaves the transport:
 * callers branch on `"ok" in result` and never look at the raw response again.
 */

import { z } from "zod";
import { RemoteOperationError, errorMessage } from "../errors";
import type { HttpResponse } from "../transport";
import { responseJson } from "../transport";

/**
 * Why a remote call failed.
 *
 * - `remote`: the body carried an `error` object
 * - `status`: non-2xx status without a usable error body
 * - `transport`: no response was received
 * - `invalid`: a 2xx body did not have the expected shape
 */
export type RemoteErrorInfo =
  | { kind: "remote"; status: number; code: string; message?: string }
  | { kind: "status"; status: number; statusText: string }
  | { kind: "transport"; message: string; cause: unknown }
  | { kind: "invalid"; status: number; message: string };

export type RemoteResult<T> = { ok: T } | { error: RemoteErrorInfo };

const RemoteErrorBodySchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string().optional(),
  }),
});

/**
 * Classify a response, parsing a successful JSON body with the given schema.
 */
export function classifyJson<S extends z.ZodTypeAny>(
  response: HttpResponse,
  schema: S
): RemoteResult<z.output<S>> {
  const body = responseJson(response);
  const failure = classifyFailure(response, body);
  if (failure) {
    return { error: failure };
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return {
      error: {
        kind: "invalid",
        status: response.status,
        message: parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
          .join("; "),
      },
    };
  }
  return { ok: parsed.data };
}

/**
 * Classify a response whose successful body is raw content. A 2xx body is
 * file content even when it is JSON with an `error` key.
 */
export function classifyBytes(response: HttpResponse): RemoteResult<Uint8Array> {
  if (isSuccessStatus(response.status)) {
    return { ok: response.body };
  }
  const isJson = (response.headers["content-type"] ?? "").includes("application/json");
  const failure = classifyFailure(response, isJson ? responseJson(response) : undefined);
  return {
    error: failure ?? { kind: "status", status: response.status, statusText: response.statusText },
  };
}

/**
 * Turn a transport rejection into a tagged failure.
 */
export function transportFailure(error: unknown): { error: RemoteErrorInfo } {
  return {
    error: {
      kind: "transport",
      message: errorMessage(error),
      cause: error,
    },
  };
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function classifyFailure(response: HttpResponse, body: unknown): RemoteErrorInfo | undefined {
  const remote = RemoteErrorBodySchema.safeParse(body);
  if (remote.success) {
    return {
      kind: "remote",
      status: response.status,
      code: remote.data.error.code,
      message: remote.data.error.message,
    };
  }
  if (!isSuccessStatus(response.status)) {
    return { kind: "status", status: response.status, statusText: response.statusText };
  }
  return undefined;
}

/**
 * Append the failure detail to a caller-supplied description,
 * e.g. `Could not upload a.txt (Code: accessDenied)`.
 */
export function describeFailure(description: string, info: RemoteErrorInfo): string {
  switch (info.kind) {
    case "remote":
      return `${description} (Code: ${info.code})`;
    case "status":
      return `${description} (HTTP ${info.status})`;
    case "transport":
      return `${description} (${info.message})`;
    case "invalid":
      return `${description} (Unexpected response: ${info.message})`;
  }
}

/**
 * Convert a failure into the error thrown by single-call operations.
 */
export function toRemoteOperationError(description: string, info: RemoteErrorInfo): RemoteOperationError {
  const message = describeFailure(description, info);
  switch (info.kind) {
    case "remote":
      return new RemoteOperationError(message, "RemoteError", {
        status: info.status,
        remoteCode: info.code,
      });
    case "status":
      return new RemoteOperationError(message, "HttpStatus", { status: info.status });
    case "transport":
      return new RemoteOperationError(message, "Transport", { cause: info.cause });
    case "invalid":
      return new RemoteOperationError(message, "InvalidResponse", { status: info.status });
  }
}

/**
 * Return the value of a successful result or throw a {@link RemoteOperationError}.
 */
export function unwrap<T>(result: RemoteResult<T>, description: string): T {
  if ("ok" in result) {
    return result.ok;
  }
  throw toRemoteOperationError(description, result.error);
}
