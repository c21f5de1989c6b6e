import { spawn } from "child_process";
import type { BoundedRunResult, ProcessLimits, ProcessRunner, ProcessSpec } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;
// After SIGKILL, stop waiting for stdio to close if a member escaped the group.
const KILL_FAILSAFE_MS = 1000;

type StopReason = { kind: "timed_out" } | { kind: "aborted"; reason: unknown };

interface CaptureState {
  bytes: number;
  truncated: boolean;
}

function appendTail(chunks: Buffer[], chunk: Buffer, state: CaptureState, maxBytes: number): void {
  chunks.push(chunk);
  state.bytes += chunk.byteLength;
  while (state.bytes > maxBytes) {
    const first = chunks[0];
    if (!first) break;
    const excess = state.bytes - maxBytes;
    state.truncated = true;
    if (first.byteLength <= excess) {
      chunks.shift();
      state.bytes -= first.byteLength;
    } else {
      chunks[0] = first.subarray(excess);
      state.bytes -= excess;
    }
  }
}

function renderCapture(chunks: Buffer[], state: CaptureState, label: string): string {
  const text = Buffer.concat(chunks).toString("utf8");
  return state.truncated ? `[${label} truncated]\n${text}` : text;
}

function isErrno(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}

/** Signals every process in the group led by `pid`. A group that is already gone is not an error. */
function signalProcessGroup(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(-pid, signal);
    return true;
  } catch (e) {
    if (isErrno(e, "ESRCH")) return false;
    throw e;
  }
}

/**
 * Runs a command as the leader of its own process group so that a timeout or
 * abort can take down everything it spawned, not just the top-level process.
 */
export class LocalProcessRunner implements ProcessRunner {
  constructor(private readonly opts: { maxCaptureBytes?: number } = {}) {}

  async run(spec: ProcessSpec, limits: ProcessLimits): Promise<BoundedRunResult> {
    const [command, ...args] = spec.argv;
    if (!command) throw new Error("argv must be non-empty");
    const maxCapture = this.opts.maxCaptureBytes ?? MAX_CAPTURE_BYTES;
    const startedAt = new Date().toISOString();

    if (limits.signal?.aborted) {
      return { kind: "aborted", reason: limits.signal.reason, stdout: "", stderr: "", startedAt, finishedAt: startedAt };
    }

    const child = spawn(command, args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ["ignore", "pipe", "pipe"] as const,
      detached: true
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const stdoutState: CaptureState = { bytes: 0, truncated: false };
    const stderrState: CaptureState = { bytes: 0, truncated: false };

    child.stdout.on("data", (chunk: Buffer) => appendTail(stdoutChunks, chunk, stdoutState, maxCapture));
    child.stderr.on("data", (chunk: Buffer) => appendTail(stderrChunks, chunk, stderrState, maxCapture));

    const run: {
      stop: StopReason | null;
      exit: { code: number | null; signal: NodeJS.Signals | null } | null;
      forceSettle: (() => void) | null;
    } = { stop: null, exit: null, forceSettle: null };
    const timers: NodeJS.Timeout[] = [];

    const killGroup = (signal: NodeJS.Signals): void => {
      const pid = child.pid;
      if (pid === undefined) return;
      try {
        signalProcessGroup(pid, signal);
      } catch {
        child.kill(signal);
      }
    };

    const terminate = (reason: StopReason): void => {
      if (run.stop !== null) return;
      run.stop = reason;
      killGroup("SIGTERM");
      const graceMs = Math.max(0, Math.floor(limits.killGraceSeconds * 1000));
      timers.push(
        setTimeout(() => {
          killGroup("SIGKILL");
          timers.push(setTimeout(() => run.forceSettle?.(), KILL_FAILSAFE_MS));
        }, graceMs)
      );
    };

    const timeoutMs = Math.max(0, Math.floor(limits.timeoutSeconds * 1000));
    if (timeoutMs > 0) {
      timers.push(setTimeout(() => terminate({ kind: "timed_out" }), timeoutMs));
    }

    const onAbort = (): void => terminate({ kind: "aborted", reason: limits.signal?.reason });
    limits.signal?.addEventListener("abort", onAbort, { once: true });

    child.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      run.exit = { code, signal };
      // Leftover group members would otherwise outlive the job.
      killGroup("SIGKILL");
    });

    try {
      await new Promise<void>((resolve, reject) => {
        run.forceSettle = () => resolve();
        child.on("error", reject);
        child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
          run.exit ??= { code, signal };
          resolve();
        });
      });
    } finally {
      for (const t of timers) clearTimeout(t);
      limits.signal?.removeEventListener("abort", onAbort);
    }

    const finishedAt = new Date().toISOString();
    const stdout = renderCapture(stdoutChunks, stdoutState, "stdout");
    const stderr = renderCapture(stderrChunks, stderrState, "stderr");
    const outcome = run.stop;

    if (outcome === null) {
      const exit = run.exit ?? { code: null, signal: null };
      return { kind: "exited", exitCode: exit.code, signal: exit.signal, stdout, stderr, startedAt, finishedAt };
    }
    if (outcome.kind === "timed_out") {
      return { kind: "timed_out", timeoutSeconds: limits.timeoutSeconds, stdout, stderr, startedAt, finishedAt };
    }
    return { kind: "aborted", reason: outcome.reason, stdout, stderr, startedAt, finishedAt };
  }
}
