import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, readFile, rm, writeFile, mkdir } from "fs/promises";
import os from "os";
import path from "path";
import { JobServiceError } from "../src/core/errors.js";
import { ResourceGuard } from "../src/execution/resourceGuard.js";
import { LocalProcessRunner } from "../src/execution/backends/localProcess.js";
import { catchAsyncError, isProcessAlive, waitFor } from "./helpers.js";

describe("ResourceGuard", () => {
  let tmpDir: string;
  let guard: ResourceGuard;

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "ipr-guard-"));
    guard = new ResourceGuard({ maxFileSizeBytes: 10, timeoutSeconds: 30, killGraceSeconds: 1 });
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  describe("validateSize", () => {
    it("returns the size of a file at the limit", async () => {
      const file = path.join(tmpDir, "ten.fasta");
      await writeFile(file, "0123456789");
      await expect(guard.validateSize(file)).resolves.toBe(10);
    });

    it("rejects a file one byte over the limit", async () => {
      const file = path.join(tmpDir, "eleven.fasta");
      await writeFile(file, "0123456789A");
      const err = await catchAsyncError(() => guard.validateSize(file));
      expect(err).toBeInstanceOf(JobServiceError);
      expect(err).toMatchObject({ kind: "SizeLimitExceeded", message: "input file is 11 bytes (max 10)" });
    });

    it("rejects missing files and directories as invalid requests", async () => {
      const missing = await catchAsyncError(() => guard.validateSize(path.join(tmpDir, "nope.fasta")));
      expect(missing).toMatchObject({ kind: "InvalidRequest" });

      const dir = path.join(tmpDir, "a-dir");
      await mkdir(dir);
      const notFile = await catchAsyncError(() => guard.validateSize(dir));
      expect(notFile).toMatchObject({ kind: "InvalidRequest", message: `input is not a regular file: ${dir}` });
    });
  });

  describe("runBounded", () => {
    it("reports exit code and captured output", async () => {
      const res = await guard.runBounded({ argv: ["sh", "-c", "echo out; echo err >&2; exit 4"] });
      expect(res.kind).toBe("exited");
      if (res.kind !== "exited") return;
      expect(res.exitCode).toBe(4);
      expect(res.signal).toBeNull();
      expect(res.stdout).toBe("out\n");
      expect(res.stderr).toBe("err\n");
    });

    it("runs in the given working directory", async () => {
      const res = await guard.runBounded({ argv: ["sh", "-c", "pwd"], cwd: tmpDir });
      expect(res.kind).toBe("exited");
      expect(res.stdout.trim()).toBe(tmpDir);
    });

    it("times out and kills the whole process group", async () => {
      const pidFile = path.join(tmpDir, "timeout.pid");
      const res = await guard.runBounded(
        { argv: ["sh", "-c", `sleep 30 & echo $! > ${pidFile}; wait`] },
        { timeoutSeconds: 0.5 }
      );
      expect(res.kind).toBe("timed_out");
      if (res.kind === "timed_out") expect(res.timeoutSeconds).toBe(0.5);

      const pid = Number((await readFile(pidFile, "utf8")).trim());
      await waitFor(() => !isProcessAlive(pid), 5000);
    });

    it("stops on abort and hands back the abort reason", async () => {
      const controller = new AbortController();
      setTimeout(() => controller.abort("cancel"), 200);
      const startedAt = Date.now();
      const res = await guard.runBounded({ argv: ["sh", "-c", "sleep 30"] }, { signal: controller.signal });
      expect(res.kind).toBe("aborted");
      if (res.kind === "aborted") expect(res.reason).toBe("cancel");
      expect(Date.now() - startedAt).toBeLessThan(5000);
    });

    it("does not start when already aborted", async () => {
      const controller = new AbortController();
      controller.abort("shutdown");
      const res = await guard.runBounded({ argv: ["sh", "-c", "exit 0"] }, { signal: controller.signal });
      expect(res).toMatchObject({ kind: "aborted", reason: "shutdown", stdout: "", stderr: "" });
    });

    it("reaps background children once the leader exits", async () => {
      const pidFile = path.join(tmpDir, "straggler.pid");
      const startedAt = Date.now();
      const res = await guard.runBounded({ argv: ["sh", "-c", `sleep 30 & echo $! > ${pidFile}; exit 0`] });
      expect(res).toMatchObject({ kind: "exited", exitCode: 0 });
      expect(Date.now() - startedAt).toBeLessThan(5000);

      const pid = Number((await readFile(pidFile, "utf8")).trim());
      await waitFor(() => !isProcessAlive(pid), 5000);
    });

    it("keeps only the tail of large output", async () => {
      const small = new ResourceGuard({
        maxFileSizeBytes: 10,
        timeoutSeconds: 30,
        killGraceSeconds: 1,
        runner: new LocalProcessRunner({ maxCaptureBytes: 8 })
      });
      const res = await small.runBounded({ argv: ["sh", "-c", "printf 'abcdefghijklmnop'"] });
      expect(res.stdout).toBe("[stdout truncated]\nijklmnop");
    });
  });
});
