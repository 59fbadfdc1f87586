import { v4 as uuidv4 } from "uuid";
import type { CampaignOperation, CampaignStatus, PublicKeyLike } from "./types.js";

export interface StatusTransitionEntry {
  id: string;
  campaignId: number;
  /** null for the creation entry. */
  from: CampaignStatus | null;
  to: CampaignStatus;
  operation: CampaignOperation;
  timestamp: number;
}

export type ContributionEvent = "created" | "increased" | "refund_requested" | "refunded";

export interface ContributionEntry {
  id: string;
  campaignId: number;
  contributor: PublicKeyLike;
  event: ContributionEvent;
  timestamp: number;
}

/** Log lengths at a point in time; see `AuditLog.rollbackTo`. */
export interface AuditMark {
  transitions: number;
  contributions: number;
}

/**
 * Append-only record of status transitions and contribution events,
 * consumed by reporting. Readers only ever receive copies.
 */
export class AuditLog {
  private readonly transitions: StatusTransitionEntry[] = [];
  private readonly contributions: ContributionEntry[] = [];

  recordTransition(
    campaignId: number,
    from: CampaignStatus | null,
    to: CampaignStatus,
    operation: CampaignOperation,
    timestamp: number
  ): void {
    this.transitions.push({ id: uuidv4(), campaignId, from, to, operation, timestamp });
  }

  recordContribution(
    campaignId: number,
    contributor: PublicKeyLike,
    event: ContributionEvent,
    timestamp: number
  ): void {
    this.contributions.push({ id: uuidv4(), campaignId, contributor, event, timestamp });
  }

  mark(): AuditMark {
    return { transitions: this.transitions.length, contributions: this.contributions.length };
  }

  /** Drops entries written after `mark`, for an operation that did not complete. */
  rollbackTo(mark: AuditMark): void {
    this.transitions.length = mark.transitions;
    this.contributions.length = mark.contributions;
  }

  getTransitions(campaignId: number): StatusTransitionEntry[] {
    return this.transitions.filter((e) => e.campaignId === campaignId).map((e) => ({ ...e }));
  }

  getContributionEvents(campaignId: number, contributor?: PublicKeyLike): ContributionEntry[] {
    return this.contributions
      .filter((e) => e.campaignId === campaignId && (contributor === undefined || e.contributor === contributor))
      .map((e) => ({ ...e }));
  }
}
