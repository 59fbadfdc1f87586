import { describe, expect, it } from "vitest";
import { AuthorizationError, StateError } from "../../src/crowdfunding/errors.js";
import { CrowdfundingPlatform } from "../../src/crowdfunding/platform.js";
import { Ed25519RevealVerifier } from "../../src/fhe/proof.js";
import { SimulatedFheBackend } from "../../src/fhe/simulated.js";
import { DURATION, FakeClock, METADATA, OPERATOR, START, createHarness } from "../helpers/harness.js";
import { identity } from "../helpers/participants.js";

describe("platform operator", () => {
  const creator = identity(1);
  const backerA = identity(10);
  const backerB = identity(11);

  function fundedCampaign() {
    const harness = createHarness();
    const id = harness.platform.createCampaign(creator, METADATA, 1000n, DURATION);
    harness.platform.contribute(id, backerA, 300n);
    harness.platform.contribute(id, backerB, 200n);
    return { ...harness, id };
  }

  it("pauses an active campaign into refunds", () => {
    const { platform, oracle, custody, id } = fundedCampaign();
    platform.emergencyPause(id, OPERATOR);

    expect(platform.getCampaign(id).status).toBe("failed");
    expect(platform.getPlatformStats()).toMatchObject({ active: 0, failed: 1 });
    expect(platform.getStatusHistory(id).at(-1)).toMatchObject({
      from: "active",
      to: "failed",
      operation: "emergencyPause",
      timestamp: START
    });

    const requestId = platform.requestRefund(id, backerA);
    if (requestId === null) throw new Error("expected a refund reveal");
    const outcome = platform.deliverReveal(oracle.respond(requestId));
    expect(outcome.kind === "refund" && outcome.transfer.amount).toBe(300n);
    expect(custody.balanceOf(id)).toBe(200n);
  });

  it("closes a paused campaign to contributions and finalization", () => {
    const { platform, clock, id } = fundedCampaign();
    platform.emergencyPause(id, OPERATOR);

    expect(() => platform.contribute(id, backerA, 10n)).toThrow("Campaign is not accepting contributions");
    clock.set(START + DURATION);
    expect(() => platform.requestFinalization(id, creator)).toThrow("Campaign is not active");
    expect(() => platform.emergencyPause(id, OPERATOR)).toThrow("Only active campaigns can be paused");
  });

  it("lets only the operator pause", () => {
    const { platform, id } = fundedCampaign();
    expect(() => platform.emergencyPause(id, creator)).toThrow(AuthorizationError);
    expect(() => platform.emergencyPause(id, backerA)).toThrow("Only the operator can pause a campaign");
    expect(platform.getCampaign(id).status).toBe("active");
  });

  it("does not pause a campaign awaiting its reveal", () => {
    const { platform, clock, id } = fundedCampaign();
    clock.set(START + DURATION);
    platform.requestFinalization(id, creator);
    expect(() => platform.emergencyPause(id, OPERATOR)).toThrow(StateError);
  });

  it("discloses encrypted amounts to the creator and the operator", () => {
    const { platform, backend, id } = fundedCampaign();
    const amounts = platform.getCampaignAmounts(id, creator);

    expect(backend.decrypt(amounts.raised)).toBe(500n);
    expect(backend.decrypt(amounts.target)).toBe(1000n);
    expect(backend.decrypt(amounts.obfuscatedTarget)).toBe(1000n * platform.getCampaign(id).multiplier);
    expect(platform.getCampaignAmounts(id, OPERATOR).raised.handle).toBe(amounts.raised.handle);
  });

  it("withholds encrypted amounts from everyone else", () => {
    const { platform, id } = fundedCampaign();
    expect(() => platform.getCampaignAmounts(id, backerA)).toThrow(
      "Only the creator or the operator can read campaign amounts"
    );
    expect(() => platform.getCampaignAmounts(99, creator)).toThrow("Campaign does not exist");
  });

  it("requires a valid operator identity", () => {
    const backend = new SimulatedFheBackend();
    expect(
      () =>
        new CrowdfundingPlatform({
          operator: "not-a-key",
          algebra: backend,
          verifier: new Ed25519RevealVerifier(identity(200)),
          clock: new FakeClock(START)
        })
    ).toThrow("Invalid operator identity");
  });
});
