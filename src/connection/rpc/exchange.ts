/**
 * One request, one response: a timed round trip over a process transport
 */

import { createChildLogger, LoggerInterface } from "../../utils/logging.js";
import {
  NotConnectedError,
  ProtocolError,
  RemoteError,
  TimeoutError,
} from "../../errors/index.js";
import { ProcessHandle, ProcessTransport } from "../transport/process.js";
import { decodeResponse, encodeNotification, encodeRequest } from "./codec.js";
import { RpcId, RpcParams } from "./types.js";

export interface RpcExchangeOptions {
  logger?: LoggerInterface;
}

/**
 * Performs request/response round trips on a transport's handle.
 *
 * Only one request is ever outstanding: calls are chained so a second caller
 * waits until the first has its response (or timeout). This keeps the id
 * counter and the stdout reader single-owner without a correlation table.
 * A late reply to an earlier, timed-out request is dropped while reading.
 */
export class RpcExchange {
  private lastId = 0;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly logger: LoggerInterface;

  constructor(
    private readonly transport: ProcessTransport,
    options: RpcExchangeOptions = {}
  ) {
    this.logger = options.logger ?? createChildLogger({ module: "rpc" });
  }

  /**
   * Id of the most recent request (0 before the first)
   */
  get currentId(): number {
    return this.lastId;
  }

  /**
   * Next request id; strictly increasing, never reused
   */
  nextRequestId(): number {
    this.lastId += 1;
    return this.lastId;
  }

  call(
    handle: ProcessHandle | null | undefined,
    method: string,
    params: RpcParams = {},
    timeoutMs: number
  ): Promise<unknown> {
    return this.serialize(() => this.roundTrip(handle, method, params, timeoutMs));
  }

  /**
   * Send a notification; no response is read
   */
  notify(
    handle: ProcessHandle | null | undefined,
    method: string,
    params: RpcParams = {}
  ): Promise<void> {
    return this.serialize(() =>
      this.transport.writeLine(handle, encodeNotification(method, params))
    );
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // the chain only orders calls; each caller observes its own result
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async roundTrip(
    handle: ProcessHandle | null | undefined,
    method: string,
    params: RpcParams,
    timeoutMs: number
  ): Promise<unknown> {
    if (!handle || !this.transport.isAlive(handle)) {
      throw new NotConnectedError("Not connected to MCP server", { method });
    }

    const id = this.nextRequestId();
    this.transport.discardPending(handle);

    this.logger.debug("Sending request", { id, method });
    await this.transport.writeLine(handle, encodeRequest(method, params, id));

    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const read = await this.transport.readLine(handle, deadline);

      if (read.kind === "timeout") {
        this.logger.warn("Request timed out", { id, method, timeoutMs });
        throw new TimeoutError(method, timeoutMs, { id });
      }

      if (read.kind === "closed") {
        throw new NotConnectedError("MCP server exited before responding", {
          id,
          method,
          exit: read.exit,
        });
      }

      const decoded = decodeResponse(read.line);
      if (!decoded.ok) {
        throw new ProtocolError(
          `Malformed response to '${method}' (${decoded.error.reason}): ${decoded.error.detail}`,
          read.line,
          { id, method, reason: decoded.error.reason }
        );
      }

      const { response } = decoded;
      if (this.isStaleReply(response.id, id)) {
        // late answer to a request that already timed out
        this.logger.debug("Dropping stale response", { id, method, responseId: response.id });
        continue;
      }

      if (response.id !== id) {
        throw new ProtocolError(
          `Response id ${String(response.id)} does not match request id ${id}`,
          read.line,
          { id, method, responseId: response.id }
        );
      }

      if (response.kind === "error") {
        throw new RemoteError(
          method,
          response.error.code,
          response.error.message,
          response.error.data
        );
      }

      this.logger.debug("Received response", { id, method });
      return response.result;
    }
  }

  /**
   * Ids below the current one were issued by this exchange for requests
   * that have since timed out
   */
  private isStaleReply(responseId: RpcId | null, id: number): boolean {
    return (
      typeof responseId === "number" &&
      Number.isInteger(responseId) &&
      responseId >= 1 &&
      responseId < id
    );
  }
}
