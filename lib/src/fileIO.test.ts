import { describe, it, expect, afterEach } from "vitest";
import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import { NodeFileIO } from "./fileIO.js";

describe("node file io", () => {
  const created: string[] = [];

  afterEach(async () => {
    for (const dir of created.splice(0)) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("creates distinct temp dirs", async () => {
    const fileIO = new NodeFileIO("bootrig-fileio-test");

    const first = await fileIO.tempDir();
    const second = await fileIO.tempDir();
    created.push(first, second);

    expect(first).not.toBe(second);
    expect(path.dirname(first)).toBe(path.resolve(os.tmpdir()));
    expect(path.basename(first).startsWith("bootrig-fileio-test")).toBe(true);
  });

  it("writes the file contents", async () => {
    const fileIO = new NodeFileIO("bootrig-fileio-test");
    const dir = await fileIO.tempDir();
    created.push(dir);
    const filePath = path.join(dir, "bosh_jumpbox_private.key");

    await fileIO.writeFile(filePath, Buffer.from("some-private-key"));

    await expect(fs.readFile(filePath, "utf8")).resolves.toBe("some-private-key");
    expect(await fs.readdir(dir)).toStrictEqual(["bosh_jumpbox_private.key"]);
  });

  it("rejects when the directory is missing", async () => {
    const fileIO = new NodeFileIO("bootrig-fileio-test");
    const dir = await fileIO.tempDir();
    created.push(dir);

    await expect(
      fileIO.writeFile(path.join(dir, "missing", "bosh_jumpbox_private.key"), Buffer.from("some-private-key")),
    ).rejects.toThrow();
  });

  it.skipIf(process.platform === "win32")("writes the file for the owner only", async () => {
    const fileIO = new NodeFileIO("bootrig-fileio-test");
    const dir = await fileIO.tempDir();
    created.push(dir);
    const filePath = path.join(dir, "bosh_jumpbox_private.key");

    await fileIO.writeFile(filePath, Buffer.from("some-private-key"));

    const stats = await fs.stat(filePath);
    expect(stats.mode & 0o777).toBe(0o600);
  });

  it("removes the partial file when the rename fails", async () => {
    const fileIO = new NodeFileIO("bootrig-fileio-test");
    const dir = await fileIO.tempDir();
    created.push(dir);
    const filePath = path.join(dir, "bosh_jumpbox_private.key");
    await fs.mkdir(filePath);
    await fs.writeFile(path.join(filePath, "keep"), "some-content");

    await expect(fileIO.writeFile(filePath, Buffer.from("some-private-key"))).rejects.toThrow();

    expect(await fs.readdir(dir)).toStrictEqual(["bosh_jumpbox_private.key"]);
    expect((await fs.stat(filePath)).isDirectory()).toBe(true);
    expect(await fs.readdir(filePath)).toStrictEqual(["keep"]);
  });
});
