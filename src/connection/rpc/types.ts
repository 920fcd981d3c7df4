/**
 * JSON-RPC envelope types exchanged with the helper process
 */

export const JSONRPC_VERSION = "2.0" as const;

export type RpcParams = Record<string, unknown>;

export type RpcId = number | string;

export interface RpcRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params: RpcParams;
  id: number;
}

/** Request without an id; the helper sends no reply */
export interface RpcNotification {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params: RpcParams;
}

export interface RpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface RpcSuccessResponse {
  kind: "success";
  id: RpcId | null;
  result: unknown;
}

export interface RpcErrorResponse {
  kind: "error";
  id: RpcId | null;
  error: RpcErrorObject;
}

/** Exactly one of result/error, by construction */
export type RpcResponse = RpcSuccessResponse | RpcErrorResponse;

export type MalformedFrameReason =
  | "empty"
  | "unparseable"
  | "missing_result_and_error"
  | "ambiguous"
  | "invalid_envelope";

export interface MalformedFrame {
  reason: MalformedFrameReason;
  detail: string;
  frame: string;
}

export type DecodeResult =
  | { ok: true; response: RpcResponse }
  | { ok: false; error: MalformedFrame };
