/**
 * Newline-delimited JSON-RPC frame encoding and decoding
 */

import { z } from "zod";
import {
  DecodeResult,
  JSONRPC_VERSION,
  MalformedFrameReason,
  RpcNotification,
  RpcParams,
  RpcRequest,
} from "./types.js";

const rpcIdSchema = z.union([z.number(), z.string(), z.null()]);

const rpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const successEnvelopeSchema = z.object({
  id: rpcIdSchema,
  result: z.unknown(),
});

const errorEnvelopeSchema = z.object({
  id: rpcIdSchema,
  error: rpcErrorSchema,
});

/**
 * Encode a request as one frame. Keys are always written in the same order,
 * so equal inputs give byte-identical frames.
 */
export function encodeRequest(
  method: string,
  params: RpcParams = {},
  id: number
): string {
  const request: RpcRequest = { jsonrpc: JSONRPC_VERSION, method, params, id };
  return `${JSON.stringify(request)}\n`;
}

export function encodeNotification(method: string, params: RpcParams = {}): string {
  const notification: RpcNotification = { jsonrpc: JSONRPC_VERSION, method, params };
  return `${JSON.stringify(notification)}\n`;
}

function malformed(
  reason: MalformedFrameReason,
  detail: string,
  frame: string
): DecodeResult {
  return { ok: false, error: { reason, detail, frame } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode one response frame. Never throws; every defect is reported as a
 * MalformedFrame with its own reason.
 */
export function decodeResponse(frame: string): DecodeResult {
  const text = frame.trim();
  if (text.length === 0) {
    return malformed("empty", "Empty frame", frame);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return malformed("unparseable", `Invalid JSON: ${detail}`, frame);
  }

  if (!isRecord(parsed)) {
    return malformed("invalid_envelope", "Frame is not a JSON object", frame);
  }

  // "error": null is treated as absent
  const hasResult = "result" in parsed;
  const hasError = "error" in parsed && parsed.error !== null;

  if (!hasResult && !hasError) {
    return malformed(
      "missing_result_and_error",
      "Response has neither result nor error",
      frame
    );
  }
  if (hasResult && hasError) {
    return malformed("ambiguous", "Response has both result and error", frame);
  }

  if (hasError) {
    const envelope = errorEnvelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      return malformed("invalid_envelope", formatIssues(envelope.error), frame);
    }
    return {
      ok: true,
      response: { kind: "error", id: envelope.data.id, error: envelope.data.error },
    };
  }

  const envelope = successEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return malformed("invalid_envelope", formatIssues(envelope.error), frame);
  }
  return {
    ok: true,
    response: { kind: "success", id: envelope.data.id, result: envelope.data.result },
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "frame"}: ${issue.message}`)
    .join("; ");
}
