import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Keypair } from "@solana/web3.js";

export async function loadSeed(): Promise<Uint8Array> {
  const path = resolve("tests/fixtures/seed.json");
  const raw = await readFile(path, "utf8");
  const data: unknown = JSON.parse(raw);

  if (!Array.isArray(data) || data.length !== 32 || !data.every((n) => Number.isInteger(n))) {
    throw new Error("Invalid seed fixture (expected array of 32 numbers)");
  }

  return Uint8Array.from(data);
}

/** Deterministic keypair shared by signing and payout tests. */
export async function loadFixtureKeypair(): Promise<Keypair> {
  return Keypair.fromSeed(await loadSeed());
}
