/**
 * Graphviz renderer — runs the `dot` binary via child_process.
 *
 *   dot -V                                   probe
 *   dot -T<format> <source> -o <output>      render
 */

import { execFile as execFileCb } from "node:child_process";
import { promisify } from "node:util";
import { RenderInvocationError } from "../errors.js";
import type { DiagramRenderer, ImageFormat, RenderOutcome, RendererProbe } from "./renderer.js";

const execFile = promisify(execFileCb);

export interface GraphvizOptions {
  /** Path to the dot binary (default: "dot"). */
  binary?: string;
  /** Per-invocation timeout in ms (default: 60_000). */
  timeoutMs?: number;
  /** Extra environment variables. */
  env?: Record<string, string>;
}

type ExecFailure = {
  message: string;
  code?: unknown;
  killed?: boolean;
  signal?: unknown;
  stdout?: unknown;
  stderr?: unknown;
};

function isExecFailure(err: unknown): err is ExecFailure {
  return typeof err === "object" && err !== null && "message" in err && typeof err.message === "string";
}

function text(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

/** Map an execFile rejection to a per-invocation error. */
export function toInvocationError(err: unknown, timeoutMs: number): RenderInvocationError {
  if (!isExecFailure(err)) return new RenderInvocationError("spawn", String(err));

  const diagnostics = text(err.stderr) || text(err.stdout) || err.message;
  // Overflow kills the child as well, with killed and signal set.
  if (err.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
    return new RenderInvocationError("spawn", `output exceeded the buffer limit; ${diagnostics}`);
  }
  if (err.killed && err.signal) {
    return new RenderInvocationError("timeout", `no output after ${timeoutMs}ms; ${diagnostics}`);
  }
  if (typeof err.code === "number") {
    return new RenderInvocationError("exit-code", diagnostics, err.code);
  }
  return new RenderInvocationError("spawn", diagnostics);
}

export class GraphvizRenderer implements DiagramRenderer {
  readonly binary: string;
  private readonly timeoutMs: number;
  private readonly env: Record<string, string>;

  constructor(options: GraphvizOptions = {}) {
    this.binary = options.binary ?? "dot";
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.env = options.env ?? {};
  }

  async probe(): Promise<RendererProbe> {
    try {
      const { stdout, stderr } = await execFile(this.binary, ["-V"], {
        env: { ...process.env, ...this.env },
        timeout: this.timeoutMs,
      });
      // dot prints its version banner on stderr
      return { available: true, version: stderr.trim() || stdout.trim() };
    } catch (err: unknown) {
      if (isExecFailure(err) && (err.code === "ENOENT" || err.code === "EACCES")) {
        return { available: false, detail: String(err.code) };
      }
      // The binary exists but `-V` misbehaved; rendering may still work.
      return { available: true, version: isExecFailure(err) ? err.message : String(err) };
    }
  }

  async invoke(sourcePath: string, format: ImageFormat, outputPath: string): Promise<RenderOutcome> {
    try {
      await execFile(this.binary, [`-T${format}`, sourcePath, "-o", outputPath], {
        env: { ...process.env, ...this.env },
        timeout: this.timeoutMs,
        maxBuffer: 10 * 1024 * 1024,
      });
      return { ok: true, outputPath };
    } catch (err: unknown) {
      return { ok: false, error: toInvocationError(err, this.timeoutMs) };
    }
  }
}
