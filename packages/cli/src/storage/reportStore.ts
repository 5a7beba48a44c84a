import fs from "node:fs/promises";
import path from "node:path";

export interface ReportWriteResult {
  absolutePath: string;
  existed: boolean;
  written: boolean;
}

export interface ReportStoreOptions {
  force: boolean;
  dryRun: boolean;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class ReportStore {
  private readonly rootAbsolute: string;

  constructor(
    outputRoot: string,
    private readonly options: ReportStoreOptions,
  ) {
    this.rootAbsolute = path.resolve(outputRoot);
  }

  resolve(fileName: string): string {
    return path.isAbsolute(fileName) ? fileName : path.resolve(this.rootAbsolute, fileName);
  }

  /**
   * Writes `content` to `fileName` (relative to the output root). Refuses to
   * replace an existing file unless the store was created with `force`.
   */
  async write(fileName: string, content: string): Promise<ReportWriteResult> {
    const absolutePath = this.resolve(fileName);
    const existed = await fileExists(absolutePath);

    if (existed && !this.options.force) {
      throw new Error(`Output file already exists: ${absolutePath}. Use -f/--force to overwrite.`);
    }

    if (this.options.dryRun) {
      return { absolutePath, existed, written: false };
    }

    await fs.mkdir(path.dirname(absolutePath), { recursive: true });

    const handle = await fs.open(absolutePath, this.options.force ? "w" : "wx");
    try {
      await handle.writeFile(content, { encoding: "utf8" });
    } finally {
      await handle.close();
    }

    return { absolutePath, existed, written: true };
  }

  async writeJson(fileName: string, value: unknown): Promise<ReportWriteResult> {
    return this.write(fileName, `${JSON.stringify(value, null, 2)}\n`);
  }
}
