import { Keypair } from "@solana/web3.js";
import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

export async function loadKeypair(path: string): Promise<Keypair> {
  const raw = await readFile(path, "utf8");
  const secret: unknown = JSON.parse(raw);
  if (!Array.isArray(secret) || !secret.every((byte): byte is number => typeof byte === "number")) {
    throw new Error(`Invalid keypair file at ${path} (expected JSON array of numbers)`);
  }
  return Keypair.fromSecretKey(Uint8Array.from(secret));
}

/**
 * Writes a fresh keypair to `path`; refuses to overwrite an existing file.
 */
export async function createKeypairFile(path: string): Promise<Keypair> {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }
  const keypair = Keypair.generate();
  await writeFile(path, JSON.stringify(Array.from(keypair.secretKey)), { encoding: "utf8", flag: "wx" });
  return keypair;
}
