import { readFileSync } from "fs";
import { chmod, writeFile } from "fs/promises";
import path from "path";
import { isTerminal } from "../src/core/jobState.js";
import type { LogEntry, Logger } from "../src/core/log.js";
import { createLogger } from "../src/core/log.js";
import type { CompletionNotice, NotificationTransport, SendOutcome } from "../src/notify/notifier.js";
import type { ServiceConfig } from "../src/service/createJobService.js";
import type { JobRecordStore } from "../src/store/jobRecordStore.js";

/**
 * Stand-in for interproscan.sh. Behaviour is chosen by the first line of the
 * input (`>mode:<mode>`): fail, sleep, nooutput, slow; anything else writes
 * one output per requested format. Every run appends the input name to
 * order.log and its arguments to args.<input>.log next to the script.
 */
const MOCK_INTERPROSCAN = `#!/bin/sh
dir=$(dirname "$0")
input=""
formats=""
outdir=""
all="$*"
while [ $# -gt 0 ]; do
  case "$1" in
    -i) input="$2"; shift 2 ;;
    -f) formats="$2"; shift 2 ;;
    -d) outdir="$2"; shift 2 ;;
    -appl) shift 2 ;;
    *) shift ;;
  esac
done
name=$(basename "$input")
echo "$name" >> "$dir/order.log"
echo "$all" > "$dir/args.$name.log"
mode=$(head -n 1 "$input" | sed -n 's/^>mode:\\([a-z]*\\).*$/\\1/p')
case "$mode" in
  fail)
    echo "mock failure for $name" >&2
    exit 3
    ;;
  sleep)
    sleep 30 &
    echo $! > "$dir/sleep.pid"
    wait
    exit 0
    ;;
  nooutput)
    exit 0
    ;;
  slow)
    sleep 1
    ;;
esac
for fmt in $(echo "$formats" | tr ',' ' '); do
  ext=$(echo "$fmt" | tr 'A-Z' 'a-z')
  printf 'seq1\\tPfam\\tPF00069\\n' > "$outdir/$name.$ext"
done
exit 0
`;

export async function writeMockTool(dir: string): Promise<string> {
  const toolPath = path.join(dir, "interproscan.sh");
  await writeFile(toolPath, MOCK_INTERPROSCAN, "utf8");
  await chmod(toolPath, 0o755);
  return toolPath;
}

export async function writeFasta(dir: string, name: string, mode: string | null = null): Promise<string> {
  const filePath = path.join(dir, name);
  const header = mode ? `>mode:${mode}` : ">seq1";
  await writeFile(filePath, `${header}\nMKVLAAGIVGLLLA\n`, "utf8");
  return filePath;
}

export function testConfig(root: string, toolPath: string, overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return {
    toolPath,
    disablePrecalc: true,
    maxFileSizeBytes: 1000,
    timeoutSeconds: 30,
    killGraceSeconds: 1,
    maxConcurrentJobs: 1,
    maxQueuedJobs: 10,
    agingIntervalSeconds: 0,
    tempDir: path.join(root, "work"),
    resultsDir: path.join(root, "results"),
    resultRetentionDays: 30,
    retentionSweepSeconds: 3600,
    notifyWebhookUrl: null,
    notifyTimeoutSeconds: 5,
    listDefaultLimit: 20,
    ...overrides
  };
}

export async function waitFor(check: () => boolean | Promise<boolean>, timeoutMs = 15_000, intervalMs = 20): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await check())) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await new Promise((r) => setTimeout(r, intervalMs));
  }
}

/** Waits until the job is terminal and its workspace has been released. */
export async function waitForSettled(store: JobRecordStore, jobId: string, timeoutMs = 15_000): Promise<void> {
  await waitFor(() => {
    const job = store.find(jobId);
    return job !== undefined && isTerminal(job.state) && job.workspacePath === null;
  }, timeoutMs);
}

/** Zombies count as dead: their parent may not be around to reap them. */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ESRCH") return false;
    throw e;
  }
  try {
    const stat = readFileSync(`/proc/${pid}/stat`, "utf8");
    return stat.slice(stat.lastIndexOf(")") + 2).charAt(0) !== "Z";
  } catch {
    return false;
  }
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected function to throw");
}

export async function catchAsyncError(fn: () => Promise<unknown>): Promise<unknown> {
  try {
    await fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected promise to reject");
}

export function capturingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { logger: createLogger({ level: "debug", sink: (e) => entries.push(e) }), entries };
}

export class RecordingTransport implements NotificationTransport {
  readonly notices: CompletionNotice[] = [];
  failWith: string | null = null;

  async send(notice: CompletionNotice): Promise<SendOutcome> {
    this.notices.push(notice);
    if (this.failWith !== null) throw new Error(this.failWith);
    return "sent";
  }
}
