import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";

export interface FileIO {
  tempDir(): Promise<string>;
  writeFile(filePath: string, contents: Uint8Array): Promise<void>;
}

export class NodeFileIO implements FileIO {
  #prefix: string;

  constructor(prefix = "bootrig") {
    this.#prefix = prefix;
  }

  async tempDir(): Promise<string> {
    return await fs.mkdtemp(path.join(os.tmpdir(), this.#prefix));
  }

  /**
   * Writes an owner-only file. The contents land in a sibling file first and
   * are renamed into place, so the target never holds a partial write.
   */
  async writeFile(filePath: string, contents: Uint8Array): Promise<void> {
    const partialPath = `${filePath}.${process.pid}.partial`;
    try {
      await fs.writeFile(partialPath, contents, { mode: 0o600 });
      await fs.rename(partialPath, filePath);
    } catch (error) {
      await fs.rm(partialPath, { force: true });
      throw error;
    }
  }
}
