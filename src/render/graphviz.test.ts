/**
 * Graphviz renderer — Unit Tests
 *
 * Mocks `node:child_process` execFile to verify argument arrays and the
 * mapping of failures to per-invocation errors.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const execFileMock = vi.hoisted(() => vi.fn());

vi.mock("node:child_process", () => ({
  execFile: execFileMock,
}));

import { GraphvizRenderer, toInvocationError } from "./graphviz.js";

type Callback = (err: unknown, result?: { stdout: string; stderr: string }) => void;

function resolveWith(stdout: string, stderr = "") {
  execFileMock.mockImplementation((_cmd: string, _args: string[], _opts: unknown, cb: Callback) => {
    cb(null, { stdout, stderr });
  });
}

function rejectWith(err: unknown) {
  execFileMock.mockImplementation((_cmd: string, _args: string[], _opts: unknown, cb: Callback) => {
    cb(err);
  });
}

describe("GraphvizRenderer", () => {
  beforeEach(() => {
    execFileMock.mockReset();
  });

  it("renders with -T<format> <source> -o <output>", async () => {
    resolveWith("");
    const renderer = new GraphvizRenderer({ timeoutMs: 5_000 });

    const outcome = await renderer.invoke("/tmp/a.dot", "svg", "/tmp/a.svg");

    expect(outcome).toEqual({ ok: true, outputPath: "/tmp/a.svg" });
    expect(execFileMock).toHaveBeenCalledWith(
      "dot",
      ["-Tsvg", "/tmp/a.dot", "-o", "/tmp/a.svg"],
      expect.objectContaining({ timeout: 5_000, maxBuffer: 10 * 1024 * 1024 }),
      expect.any(Function),
    );
  });

  it("uses the configured binary", async () => {
    resolveWith("");
    await new GraphvizRenderer({ binary: "/opt/graphviz/bin/dot" }).invoke("a.dot", "png", "a.png");
    expect(execFileMock.mock.calls[0]?.[0]).toBe("/opt/graphviz/bin/dot");
  });

  it("reports a non-zero exit with the renderer's stderr", async () => {
    rejectWith(Object.assign(new Error("Command failed"), { code: 1, stdout: "", stderr: "Error: syntax error in line 3\n" }));

    const outcome = await new GraphvizRenderer().invoke("bad.dot", "png", "bad.png");

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.reason).toBe("exit-code");
    expect(outcome.error.exitCode).toBe(1);
    expect(outcome.error.diagnostics).toBe("Error: syntax error in line 3");
    expect(outcome.error.message).toBe("Renderer exited with code 1: Error: syntax error in line 3");
  });

  it("reports a killed process as a timeout", async () => {
    rejectWith(Object.assign(new Error("Command failed"), { killed: true, signal: "SIGTERM", code: null }));

    const outcome = await new GraphvizRenderer({ timeoutMs: 1_000 }).invoke("slow.dot", "pdf", "slow.pdf");

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.reason).toBe("timeout");
    expect(outcome.error.diagnostics).toBe("no output after 1000ms; Command failed");
  });

  it("probes with -V and reads the banner from stderr", async () => {
    resolveWith("", "dot - graphviz version 9.0.0 (20230911.1827)\n");
    await expect(new GraphvizRenderer().probe()).resolves.toEqual({
      available: true,
      version: "dot - graphviz version 9.0.0 (20230911.1827)",
    });
    expect(execFileMock.mock.calls[0]?.[1]).toEqual(["-V"]);
  });

  it("reports a missing binary as unavailable", async () => {
    rejectWith(Object.assign(new Error("spawn dot ENOENT"), { code: "ENOENT" }));
    await expect(new GraphvizRenderer().probe()).resolves.toEqual({ available: false, detail: "ENOENT" });
  });
});

describe("toInvocationError", () => {
  it("treats anything unrecognized as a spawn failure", () => {
    const err = toInvocationError("boom", 1_000);
    expect(err.reason).toBe("spawn");
    expect(err.message).toBe("Renderer spawn: boom");
  });

  it("falls back to stdout when stderr is empty", () => {
    const err = toInvocationError({ message: "Command failed", code: 2, stdout: "warning only", stderr: "" }, 1_000);
    expect(err.diagnostics).toBe("warning only");
    expect(err.exitCode).toBe(2);
  });

  it("does not mistake an output overflow for a timeout", () => {
    const err = toInvocationError(
      {
        message: "stdout maxBuffer length exceeded",
        code: "ERR_CHILD_PROCESS_STDIO_MAXBUFFER",
        killed: true,
        signal: "SIGTERM",
        stdout: "",
        stderr: "",
      },
      1_000,
    );
    expect(err.reason).toBe("spawn");
    expect(err.diagnostics).toBe("output exceeded the buffer limit; stdout maxBuffer length exceeded");
  });
});
