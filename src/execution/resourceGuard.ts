import { promises as fs, constants as fsConstants } from "fs";
import { JobServiceError, errorMessage } from "../core/errors.js";
import { LocalProcessRunner } from "./backends/localProcess.js";
import type { BoundedRunResult, ProcessRunner, ProcessSpec } from "./backends/types.js";

export interface ResourceGuardOptions {
  maxFileSizeBytes: number;
  timeoutSeconds: number;
  killGraceSeconds: number;
  runner?: ProcessRunner;
}

export class ResourceGuard {
  private readonly runner: ProcessRunner;

  constructor(private readonly opts: ResourceGuardOptions) {
    this.runner = opts.runner ?? new LocalProcessRunner();
  }

  get maxFileSizeBytes(): number {
    return this.opts.maxFileSizeBytes;
  }

  get timeoutSeconds(): number {
    return this.opts.timeoutSeconds;
  }

  /** Returns the file's size in bytes. */
  async validateSize(filePath: string): Promise<number> {
    let size: number;
    try {
      const st = await fs.stat(filePath);
      if (!st.isFile()) {
        throw new JobServiceError("InvalidRequest", `input is not a regular file: ${filePath}`);
      }
      await fs.access(filePath, fsConstants.R_OK);
      size = st.size;
    } catch (e) {
      if (e instanceof JobServiceError) throw e;
      throw new JobServiceError("InvalidRequest", `input file not readable: ${filePath} (${errorMessage(e)})`);
    }

    if (size > this.opts.maxFileSizeBytes) {
      throw new JobServiceError(
        "SizeLimitExceeded",
        `input file is ${size} bytes (max ${this.opts.maxFileSizeBytes})`
      );
    }
    return size;
  }

  async runBounded(spec: ProcessSpec, opts: { timeoutSeconds?: number; signal?: AbortSignal } = {}): Promise<BoundedRunResult> {
    return this.runner.run(spec, {
      timeoutSeconds: opts.timeoutSeconds ?? this.opts.timeoutSeconds,
      killGraceSeconds: this.opts.killGraceSeconds,
      signal: opts.signal
    });
  }
}
