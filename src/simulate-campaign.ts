import { Keypair } from "@solana/web3.js";
import { CrowdfundingPlatform } from "./crowdfunding/platform.js";
import { buildPayoutTransaction } from "./crowdfunding/payouts.js";
import type { Clock } from "./crowdfunding/types.js";
import { Ed25519RevealVerifier } from "./fhe/proof.js";
import { SimulatedFheBackend, SimulatedRevealOracle } from "./fhe/simulated.js";
import { RPC_URL, loadProtocolConfig } from "./env.js";

type Mode = "success" | "failure" | "stalled";

function getMode(): Mode {
  const arg = process.argv.find((a) => a.startsWith("--mode="));
  const mode = arg?.split("=")[1] ?? "success";
  if (mode !== "success" && mode !== "failure" && mode !== "stalled") {
    throw new Error("Invalid --mode. Use --mode=success, --mode=failure or --mode=stalled");
  }
  return mode;
}

class ManualClock implements Clock {
  constructor(private nowUnix: number) {}

  now(): number {
    return this.nowUnix;
  }

  advance(seconds: number): void {
    this.nowUnix += seconds;
  }
}

function main() {
  const mode = getMode();
  const config = loadProtocolConfig();
  const clock = new ManualClock(Math.floor(Date.now() / 1000));
  const backend = new SimulatedFheBackend();
  const oracle = new SimulatedRevealOracle(backend, Keypair.generate());
  const operator = Keypair.generate().publicKey.toBase58();
  const platform = new CrowdfundingPlatform({
    operator,
    algebra: backend,
    verifier: new Ed25519RevealVerifier(oracle.publicKey),
    clock,
    config
  });

  const creator = Keypair.generate().publicKey.toBase58();
  const backers = [Keypair.generate(), Keypair.generate(), Keypair.generate()].map((k) =>
    k.publicKey.toBase58()
  );
  const amounts = mode === "failure" ? [300n, 200n, 100n] : [400n, 400n, 300n];

  console.log("Mode:", mode);
  console.log("Oracle key:", oracle.publicKey);

  const id = platform.createCampaign(
    creator,
    {
      title: "Traditional Music Archive",
      description: "Digitizing recordings from community elders",
      category: "Music",
      contentRef: "ipfs://example"
    },
    1000n,
    config.minFundingDuration
  );
  console.log("Created campaign", id, "multiplier", platform.getCampaign(id).multiplier.toString());

  backers.forEach((backer, i) => platform.contribute(id, backer, amounts[i]));
  console.log("Backers:", platform.getCampaign(id).backerCount);

  clock.advance(config.minFundingDuration);
  const requestId = platform.requestFinalization(id, creator);
  console.log("Finalization requested:", requestId);

  if (mode === "stalled") {
    let pending: string | null = requestId;
    while (pending !== null) {
      clock.advance(config.revealTimeout);
      pending = platform.onTimeoutCheck(id, creator);
      console.log("Timeout check ->", pending ?? "decryption_failed");
    }
    clock.advance(2 * config.revealTimeout);
    for (const backer of backers) {
      const transfer = platform.emergencyRefund(id, backer);
      console.log("Emergency refund", backer, transfer.amount.toString());
    }
    return;
  }

  const outcome = platform.deliverReveal(oracle.respond(requestId));
  console.log("Reveal outcome:", outcome);

  if (mode === "success") {
    const transfer = platform.withdraw(id, creator);
    const tx = buildPayoutTransaction(transfer, Keypair.generate().publicKey, "11111111111111111111111111111111");
    console.log("Withdrawn:", transfer.amount.toString());
    console.log("Payout instructions:", tx.instructions.length, "for", RPC_URL);
    return;
  }

  for (const backer of backers) {
    const refundRequest = platform.requestRefund(id, backer);
    if (refundRequest === null) continue;
    const refund = platform.deliverReveal(oracle.respond(refundRequest));
    if (refund.kind === "refund") {
      console.log("Refunded", backer, refund.transfer.amount.toString());
    }
  }
  console.log("Stats:", platform.getPlatformStats());
}

try {
  main();
} catch (err) {
  console.error("Simulation failed:", err);
  process.exit(1);
}
