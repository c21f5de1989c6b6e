import { createHash } from "crypto";
import { createReadStream, createWriteStream, promises as fs } from "fs";
import path from "path";
import { Transform } from "stream";
import { pipeline } from "stream/promises";
import type { JobId } from "../core/ids.js";
import type { OutputFormat, ResultFile, ResultRef } from "../core/job.js";
import { safeJoin } from "../execution/workspace.js";

export interface CollectSource {
  name: string;
  format: OutputFormat;
  path: string;
}

/**
 * Durable per-job result directories. A job's files are copied into a
 * `.partial` directory and renamed into place, so a result directory is either
 * complete or absent.
 */
export class ResultStore {
  constructor(private readonly rootDir: string) {}

  async init(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
  }

  jobDir(jobId: JobId): string {
    return path.join(path.resolve(this.rootDir), jobId);
  }

  async collect(jobId: JobId, sources: CollectSource[]): Promise<ResultRef> {
    await this.init();
    const finalDir = this.jobDir(jobId);
    const partialDir = `${finalDir}.partial`;
    await fs.rm(partialDir, { recursive: true, force: true });
    await fs.mkdir(partialDir, { recursive: true });

    const files: ResultFile[] = [];
    try {
      for (const src of sources) {
        const dest = safeJoin(partialDir, src.name);
        const { sizeBytes, checksumSha256 } = await copyWithChecksum(src.path, dest);
        files.push({ name: src.name, format: src.format, path: safeJoin(finalDir, src.name), sizeBytes, checksumSha256 });
      }
      await fs.rm(finalDir, { recursive: true, force: true });
      await fs.rename(partialDir, finalDir);
    } catch (e) {
      await fs.rm(partialDir, { recursive: true, force: true });
      throw e;
    }

    return { resultDir: finalDir, files };
  }

  async readTextPreview(
    ref: ResultRef,
    fileName: string,
    opts: { maxBytes: number; maxLines: number }
  ): Promise<{ preview: string; truncated: boolean }> {
    const file = ref.files.find((f) => f.name === fileName);
    if (!file) throw new Error(`unknown result file: ${fileName}`);
    const filePath = safeJoin(ref.resultDir, file.name);

    const fd = await fs.open(filePath, "r");
    try {
      const buffer = Buffer.alloc(opts.maxBytes);
      const { bytesRead } = await fd.read(buffer, 0, opts.maxBytes, 0);
      const text = buffer.subarray(0, bytesRead).toString("utf8");

      const lines = text.split(/\r?\n/);
      const limited = lines.slice(0, opts.maxLines).join("\n");

      const stats = await fd.stat();
      const truncatedByBytes = stats.size > bytesRead;
      const truncatedByLines = lines.length > opts.maxLines;

      return { preview: limited, truncated: truncatedByBytes || truncatedByLines };
    } finally {
      await fd.close();
    }
  }

  async remove(jobId: JobId): Promise<void> {
    const dir = this.jobDir(jobId);
    await fs.rm(dir, { recursive: true, force: true });
    await fs.rm(`${dir}.partial`, { recursive: true, force: true });
  }
}

async function copyWithChecksum(
  sourcePath: string,
  destinationPath: string
): Promise<{ sizeBytes: number; checksumSha256: `sha256:${string}` }> {
  const hash = createHash("sha256");
  let total = 0;

  const meter = new Transform({
    transform(chunk: Buffer, _enc, cb) {
      total += chunk.byteLength;
      hash.update(chunk);
      cb(null, chunk);
    }
  });

  await pipeline(createReadStream(sourcePath), meter, createWriteStream(destinationPath));
  return { sizeBytes: total, checksumSha256: `sha256:${hash.digest("hex")}` };
}
