import { describe, expect, it } from "vitest";
import { InMemoryCustody } from "../../src/crowdfunding/custody.js";
import { ResourceError, ValidationError } from "../../src/crowdfunding/errors.js";
import { identity } from "../helpers/participants.js";

describe("in-memory custody", () => {
  const backer = identity(10);
  const creator = identity(1);

  it("holds balances per campaign", () => {
    const custody = new InMemoryCustody();
    custody.deposit(1, backer, 300n);
    custody.deposit(1, backer, 200n);
    custody.deposit(2, backer, 50n);

    expect(custody.balanceOf(1)).toBe(500n);
    expect(custody.balanceOf(2)).toBe(50n);
    expect(custody.balanceOf(3)).toBe(0n);
  });

  it("records transfers and debits the campaign", () => {
    const custody = new InMemoryCustody();
    custody.deposit(1, backer, 500n);
    const record = custody.transfer(1, creator, 450n, "withdrawal", 1_234);

    expect(record).toMatchObject({ campaignId: 1, to: creator, amount: 450n, reason: "withdrawal", timestamp: 1_234 });
    expect(record.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(custody.balanceOf(1)).toBe(50n);
    expect(custody.getTransfers()).toHaveLength(1);
    expect(custody.getTransfers(2)).toEqual([]);
  });

  it("refuses to overdraw and records nothing", () => {
    const custody = new InMemoryCustody();
    custody.deposit(1, backer, 100n);

    expect(() => custody.transfer(1, creator, 101n, "withdrawal", 0)).toThrow(ResourceError);
    expect(() => custody.transfer(1, creator, 0n, "withdrawal", 0)).toThrow(ValidationError);
    expect(() => custody.deposit(1, backer, -5n)).toThrow(ValidationError);
    expect(custody.balanceOf(1)).toBe(100n);
    expect(custody.getTransfers()).toEqual([]);
  });
});
