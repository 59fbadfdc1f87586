import { describe, expect, it } from "vitest";
import { StateError } from "../../src/crowdfunding/errors.js";
import { DEADLINE, DURATION, METADATA, REVEAL_TIMEOUT, createHarness } from "../helpers/harness.js";
import { identity } from "../helpers/participants.js";

describe("timeout and retry controller", () => {
  const creator = identity(1);
  const keeper = identity(40);

  function pendingCampaign() {
    const harness = createHarness();
    const id = harness.platform.createCampaign(creator, METADATA, 1000n, DURATION);
    harness.platform.contribute(id, identity(10), 700n);
    harness.platform.contribute(id, identity(11), 500n);
    harness.clock.set(DEADLINE);
    const firstRequest = harness.platform.requestFinalization(id, creator);
    return { ...harness, id, firstRequest };
  }

  it("rejects a check before the reveal timeout elapses", () => {
    const { platform, clock, id } = pendingCampaign();
    clock.set(DEADLINE + REVEAL_TIMEOUT - 1);
    expect(() => platform.onTimeoutCheck(id, keeper)).toThrow("Reveal request has not timed out");
    expect(platform.getCampaign(id).retryCount).toBe(0);
  });

  it("resubmits the same pair under a new request id", () => {
    const { platform, clock, backend, id, firstRequest } = pendingCampaign();
    clock.set(DEADLINE + REVEAL_TIMEOUT);
    const retry = platform.onTimeoutCheck(id, keeper);

    expect(retry).not.toBeNull();
    expect(retry).not.toBe(firstRequest);
    const campaign = platform.getCampaign(id);
    expect(campaign.status).toBe("decryption_pending");
    expect(campaign.retryCount).toBe(1);
    expect(campaign.requestId).toBe(retry);
    expect(campaign.requestedAt).toBe(DEADLINE + REVEAL_TIMEOUT);
    expect(platform.getRevealRequest(firstRequest)?.timedOut).toBe(true);

    const resubmitted = backend.getPendingRequests().find((r) => r.requestId === retry);
    expect(resubmitted?.ciphertexts.map((ct) => backend.decrypt(ct))).toEqual([1200n, 1000n]);
  });

  it("rejects a late response to a superseded request", () => {
    const { platform, clock, oracle, id, firstRequest } = pendingCampaign();
    clock.set(DEADLINE + REVEAL_TIMEOUT);
    const retry = platform.onTimeoutCheck(id, keeper);

    expect(() => platform.deliverReveal(oracle.respond(firstRequest))).toThrow("Stale reveal response");
    expect(platform.getCampaign(id).status).toBe("decryption_pending");

    if (retry === null) throw new Error("expected a retry");
    const outcome = platform.deliverReveal(oracle.respond(retry));
    expect(outcome).toEqual({ kind: "settlement", campaignId: id, status: "successful" });
  });

  it("fails the campaign after exactly maxRetries unanswered checks", () => {
    const { platform, clock, id } = pendingCampaign();
    let now = DEADLINE;
    const results: (string | null)[] = [];
    for (let i = 0; i < 3; i++) {
      now += REVEAL_TIMEOUT;
      clock.set(now);
      results.push(platform.onTimeoutCheck(id, keeper));
    }

    expect(results[0]).not.toBeNull();
    expect(results[1]).not.toBeNull();
    expect(results[2]).toBeNull();

    const campaign = platform.getCampaign(id);
    expect(campaign.status).toBe("decryption_failed");
    expect(campaign.retryCount).toBe(3);
    expect(campaign.requestedAt).toBe(DEADLINE + 2 * REVEAL_TIMEOUT);
    expect(platform.getRevealRequest(results[1] ?? "")?.timedOut).toBe(true);

    clock.set(now + REVEAL_TIMEOUT);
    expect(() => platform.onTimeoutCheck(id, keeper)).toThrow(StateError);
    expect(platform.getPlatformStats()).toMatchObject({ decryptionPending: 0, decryptionFailed: 1 });
  });

  it("honours a configured retry bound", () => {
    const harness = createHarness({ maxRetries: 1 });
    const id = harness.platform.createCampaign(creator, METADATA, 1000n, DURATION);
    harness.clock.set(DEADLINE);
    harness.platform.requestFinalization(id, creator);

    harness.clock.set(DEADLINE + REVEAL_TIMEOUT);
    expect(harness.platform.onTimeoutCheck(id, keeper)).toBeNull();
    expect(harness.platform.getCampaign(id).status).toBe("decryption_failed");
  });

  it("records each retry in the status history", () => {
    const { platform, clock, id } = pendingCampaign();
    clock.set(DEADLINE + REVEAL_TIMEOUT);
    platform.onTimeoutCheck(id, keeper);

    const history = platform.getStatusHistory(id).map((t) => [t.from, t.to, t.operation]);
    expect(history).toEqual([
      [null, "active", "createCampaign"],
      ["active", "decryption_pending", "requestFinalization"],
      ["decryption_pending", "decryption_pending", "onTimeoutCheck"]
    ]);
  });

  it("rejects checks on campaigns that are not pending", () => {
    const { platform, clock, oracle, id, firstRequest } = pendingCampaign();
    platform.deliverReveal(oracle.respond(firstRequest));
    clock.set(DEADLINE + REVEAL_TIMEOUT);
    expect(() => platform.onTimeoutCheck(id, keeper)).toThrow("No reveal is pending for this campaign");
  });
});
