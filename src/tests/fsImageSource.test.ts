import test from "node:test";
import assert from "node:assert/strict";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { FsImageSource } from "../adapters/input/fsImageSource";
import { UploadRejectedError } from "../domain/errors";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "cover-src-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test("Lee archivos con extension permitida", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "Front.PNG");
    await writeFile(path, Buffer.from([1, 2, 3, 4]));
    const bytes = await new FsImageSource().load(path, "frontImage");
    assert.deepEqual([...bytes], [1, 2, 3, 4]);
  });
});

test("Rechaza extensiones fuera de la lista", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "notes.txt");
    await writeFile(path, "hola");
    await assert.rejects(
      () => new FsImageSource().load(path, "backImage"),
      (err: unknown) => err instanceof UploadRejectedError && err.field === "backImage"
    );
  });
});

test("Rechaza archivos demasiado grandes", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "big.jpg");
    await writeFile(path, Buffer.alloc(20));
    await assert.rejects(() => new FsImageSource(10).load(path, "frontImage"), UploadRejectedError);
  });
});

test("Rechaza directorios", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "folder.png");
    await mkdir(path);
    await assert.rejects(() => new FsImageSource().load(path, "frontImage"), UploadRejectedError);
  });
});
