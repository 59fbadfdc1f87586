import { describe, expect, it } from "vitest";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { CampaignStatus, TransferReason } from "../../src/crowdfunding/types.js";
import { DURATION, METADATA, START, createHarness } from "../helpers/harness.js";
import { identity } from "../helpers/participants.js";

type ScenarioEvent = { at: number; expectError?: string } & (
  | { type: "contribute"; backer: number; amount: string }
  | { type: "finalize"; caller: number }
  | { type: "reveal" }
  | { type: "timeout"; caller: number }
  | { type: "withdraw"; caller: number }
  | { type: "refund"; caller: number }
  | { type: "emergency_refund"; caller: number }
  | { type: "pause"; caller: number }
);

interface ExpectedTransfer {
  to: number;
  amount: string;
  reason: TransferReason;
}

interface Scenario {
  name: string;
  description: string;
  target: string;
  events: ScenarioEvent[];
  expectedStatus: CampaignStatus;
  expectedTransfers: ExpectedTransfer[];
}

const CREATOR_SEED = 1;

async function loadScenario(filename: string): Promise<Scenario> {
  const path = fileURLToPath(new URL(`../scenarios/${filename}`, import.meta.url));
  const content = await readFile(path, "utf-8");
  return JSON.parse(content);
}

function executeScenario(scenario: Scenario) {
  const harness = createHarness();
  const { platform, clock, oracle } = harness;
  const id = platform.createCampaign(identity(CREATOR_SEED), METADATA, BigInt(scenario.target), DURATION);

  const apply = (event: ScenarioEvent): void => {
    switch (event.type) {
      case "contribute":
        platform.contribute(id, identity(event.backer), BigInt(event.amount));
        break;
      case "finalize":
        platform.requestFinalization(id, identity(event.caller));
        break;
      case "reveal": {
        const { requestId } = platform.getCampaign(id);
        if (requestId === null) throw new Error(`${scenario.name}: no reveal to answer at ${event.at}`);
        platform.deliverReveal(oracle.respond(requestId));
        break;
      }
      case "timeout":
        platform.onTimeoutCheck(id, identity(event.caller));
        break;
      case "withdraw":
        platform.withdraw(id, identity(event.caller));
        break;
      case "refund": {
        const requestId = platform.requestRefund(id, identity(event.caller));
        if (requestId !== null) platform.deliverReveal(oracle.respond(requestId));
        break;
      }
      case "emergency_refund":
        platform.emergencyRefund(id, identity(event.caller));
        break;
      case "pause":
        platform.emergencyPause(id, identity(event.caller));
        break;
    }
  };

  for (const event of scenario.events) {
    clock.set(START + event.at);
    if (event.expectError !== undefined) {
      expect(() => apply(event), `${event.type} at +${event.at}`).toThrow(event.expectError);
    } else {
      apply(event);
    }
  }

  return { ...harness, id };
}

describe("scenario runner", () => {
  it.each(["successful-raise.json", "failed-raise-refunds.json", "oracle-outage.json", "operator-pause.json"])(
    "replays %s",
    async (filename) => {
      const scenario = await loadScenario(filename);
      const { platform, custody, id } = executeScenario(scenario);

      expect(platform.getCampaign(id).status).toBe(scenario.expectedStatus);
      expect(custody.getTransfers(id).map((t) => ({ to: t.to, amount: t.amount, reason: t.reason }))).toEqual(
        scenario.expectedTransfers.map((t) => ({ to: identity(t.to), amount: BigInt(t.amount), reason: t.reason }))
      );
      expect(custody.balanceOf(id)).toBe(0n);
    }
  );

  it("leaves the campaign's transitions consistent with its final status", async () => {
    const scenario = await loadScenario("oracle-outage.json");
    const { platform, id } = executeScenario(scenario);

    expect(platform.getStatusHistory(id).map((t) => t.to)).toEqual([
      "active",
      "decryption_pending",
      "decryption_pending",
      "decryption_pending",
      "decryption_failed"
    ]);
    expect(platform.getCampaign(id).retryCount).toBe(3);
  });
});
