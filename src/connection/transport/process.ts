/**
 * Process transport: owns one helper child process and its stdio streams
 */

import { spawn, ChildProcessWithoutNullStreams } from "child_process";
import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import { createChildLogger, LoggerInterface } from "../../utils/logging.js";
import { NotConnectedError, ProtocolError, SpawnError } from "../../errors/index.js";
import {
  ProcessCommand,
  ProcessExitInfo,
  ReadResult,
  formatCommand,
} from "../types.js";

export const DEFAULT_SHUTDOWN_GRACE_MS = 5000;
const KILL_WAIT_MS = 2000;

export interface ProcessTransportOptions {
  /** How long disconnect waits after SIGTERM before SIGKILL */
  graceMs?: number;
  logger?: LoggerInterface;
}

/**
 * A live (or exited) helper process. Only the transport that created it may
 * read from or write to it.
 */
export class ProcessHandle {
  readonly id = uuidv4();
  readonly startedAt = new Date();
  exitInfo?: ProcessExitInfo;

  /** Frames that arrived while no reader was waiting */
  readonly pendingLines: string[] = [];
  waiter?: (result: ReadResult) => void;

  constructor(
    readonly child: ChildProcessWithoutNullStreams,
    readonly command: ProcessCommand
  ) {}

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exited(): boolean {
    return this.exitInfo !== undefined;
  }

  deliver(result: ReadResult): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(result);
    } else if (result.kind === "line") {
      this.pendingLines.push(result.line);
    }
  }
}

/**
 * Calls `onLine` for each newline-terminated line of a text stream. A trailing
 * fragment with no newline is never emitted.
 */
function splitLines(
  stream: NodeJS.ReadableStream,
  onLine: (line: string) => void
): void {
  let buffer = "";
  stream.setEncoding("utf8");
  stream.on("data", (chunk: string) => {
    buffer += chunk;
    let newline = buffer.indexOf("\n");
    while (newline !== -1) {
      const line = buffer.slice(0, newline).replace(/\r$/, "");
      buffer = buffer.slice(newline + 1);
      onLine(line);
      newline = buffer.indexOf("\n");
    }
  });
}

export class ProcessTransport extends EventEmitter {
  private handle: ProcessHandle | null = null;
  private readonly graceMs: number;
  private readonly logger: LoggerInterface;

  constructor(options: ProcessTransportOptions = {}) {
    super();
    this.graceMs = options.graceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
    this.logger = options.logger ?? createChildLogger({ module: "transport" });
  }

  /**
   * The handle this transport currently owns, if any
   */
  get current(): ProcessHandle | null {
    return this.handle;
  }

  /**
   * Spawn the helper process. Resolves once the OS has started it.
   */
  async connect(command: ProcessCommand): Promise<ProcessHandle> {
    if (this.handle && this.isAlive(this.handle)) {
      this.logger.debug("Reusing live helper process", { pid: this.handle.pid });
      return this.handle;
    }
    this.handle = null;

    const commandLine = formatCommand(command);
    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(command.command, command.args ?? [], {
        cwd: command.cwd,
        env: { ...process.env, ...command.env },
        stdio: "pipe",
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SpawnError(commandLine, reason, error);
    }

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off("error", onError);
        resolve();
      };
      const onError = (error: Error) => {
        child.off("spawn", onSpawn);
        reject(new SpawnError(commandLine, error.message, error));
      };
      child.once("spawn", onSpawn);
      child.once("error", onError);
    });

    const handle = new ProcessHandle(child, command);
    this.attach(handle);
    this.handle = handle;

    this.logger.info("Started MCP server process", {
      command: commandLine,
      pid: handle.pid,
    });
    return handle;
  }

  /**
   * True iff `handle` is this transport's handle and its process is running
   */
  isAlive(handle: ProcessHandle | null | undefined): boolean {
    return !!handle && handle === this.handle && !handle.exited;
  }

  async writeLine(handle: ProcessHandle | null | undefined, line: string): Promise<void> {
    const live = this.assertAlive(handle, "write");
    const frame = line.endsWith("\n") ? line : `${line}\n`;

    await new Promise<void>((resolve, reject) => {
      live.child.stdin.write(frame, (error) => {
        if (error) {
          reject(
            new NotConnectedError(`Failed to write to MCP server: ${error.message}`, {
              pid: live.pid,
            })
          );
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Wait for the next frame until `deadline` (epoch ms)
   */
  async readLine(
    handle: ProcessHandle | null | undefined,
    deadline: number
  ): Promise<ReadResult> {
    const live = this.assertAlive(handle, "read");

    const pending = live.pendingLines.shift();
    if (pending !== undefined) {
      return { kind: "line", line: pending };
    }

    if (live.waiter) {
      throw new ProtocolError("Another read is already waiting on this handle");
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return { kind: "timeout" };
    }

    return new Promise<ReadResult>((resolve) => {
      const timer = setTimeout(() => {
        live.waiter = undefined;
        resolve({ kind: "timeout" });
      }, remaining);

      live.waiter = (result) => {
        clearTimeout(timer);
        resolve(result);
      };
    });
  }

  /**
   * Drop frames nobody read, such as late replies to timed-out requests
   */
  discardPending(handle: ProcessHandle | null | undefined): number {
    if (!handle) {
      return 0;
    }
    const count = handle.pendingLines.length;
    handle.pendingLines.length = 0;
    if (count > 0) {
      this.logger.debug("Discarded unread frames", { count, pid: handle.pid });
    }
    return count;
  }

  /**
   * Terminate the process: SIGTERM, wait up to the grace period, then SIGKILL.
   * The handle is released on every path.
   */
  async disconnect(handle: ProcessHandle | null | undefined = this.handle): Promise<void> {
    if (!handle) {
      return;
    }

    try {
      if (handle.exited) {
        return;
      }

      handle.child.stdin.end();
      handle.child.kill("SIGTERM");

      if (!(await this.waitForExit(handle, this.graceMs))) {
        this.logger.warn("MCP server did not exit after SIGTERM, killing", {
          pid: handle.pid,
          graceMs: this.graceMs,
        });
        handle.child.kill("SIGKILL");
        await this.waitForExit(handle, KILL_WAIT_MS);
      }

      this.logger.info("Disconnected from MCP server", { pid: handle.pid });
    } finally {
      if (this.handle === handle) {
        this.handle = null;
      }
    }
  }

  private assertAlive(
    handle: ProcessHandle | null | undefined,
    operation: "read" | "write"
  ): ProcessHandle {
    if (!handle || !this.isAlive(handle)) {
      throw new NotConnectedError("Not connected to MCP server", {
        operation,
        exit: handle?.exitInfo,
      });
    }
    return handle;
  }

  private waitForExit(handle: ProcessHandle, timeoutMs: number): Promise<boolean> {
    if (handle.exited) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const onExit = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        handle.child.off("exit", onExit);
        resolve(false);
      }, timeoutMs);
      handle.child.once("exit", onExit);
    });
  }

  private attach(handle: ProcessHandle): void {
    const { child } = handle;

    splitLines(child.stdout, (line) => {
      handle.deliver({ kind: "line", line });
    });

    // Diagnostics only; never parsed as frames
    splitLines(child.stderr, (line) => {
      this.logger.debug("MCP server stderr", { pid: handle.pid, line });
      this.emit("stderr", line);
    });

    child.stdin.on("error", (error) => {
      this.logger.debug("MCP server stdin error", {
        pid: handle.pid,
        error: error.message,
      });
    });

    child.on("error", (error) => {
      this.logger.error("MCP server process error", {
        pid: handle.pid,
        error: error.message,
      });
    });

    child.on("exit", (code, signal) => {
      handle.exitInfo = { pid: handle.pid, code, signal };
      this.logger.info("MCP server process exited", handle.exitInfo);
    });

    // stdout is fully drained by the time "close" fires
    child.on("close", () => {
      const exit = handle.exitInfo;
      handle.deliver({ kind: "closed", exit });
      if (this.handle === handle) {
        this.handle = null;
      }
      this.emit("exit", exit ?? { pid: handle.pid, code: null, signal: null });
    });
  }
}
