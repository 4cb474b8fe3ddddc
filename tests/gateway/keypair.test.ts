import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createKeypairFile, loadKeypair } from "../../src/gateway/keypair.js";

describe("keypair files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "escrow-keys-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads what it wrote, creating the directory", async () => {
    const path = join(dir, "nested", "escrow.json");

    const created = await createKeypairFile(path);
    const loaded = await loadKeypair(path);

    expect(loaded.publicKey.toBase58()).toBe(created.publicKey.toBase58());
  });

  it("never overwrites an existing keypair", async () => {
    const path = join(dir, "escrow.json");
    await createKeypairFile(path);

    await expect(createKeypairFile(path)).rejects.toMatchObject({ code: "EEXIST" });
  });

  it("rejects a file that is not a byte array", async () => {
    const path = join(dir, "escrow.json");
    await writeFile(path, JSON.stringify({ secret: "test-secret" }), "utf8");

    await expect(loadKeypair(path)).rejects.toThrow(`Invalid keypair file at ${path}`);
  });
});
