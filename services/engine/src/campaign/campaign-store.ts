/**
 * Campaign Store
 *
 * Campaign records keyed by sequential id, with secondary indexes
 * creator -> campaign ids and investor -> campaign ids.
 * Investment writes take a unit of work so a rolled-back purchase leaves
 * no trace in any index. Address keys are stored checksummed.
 */

import { getAddress, type Address } from "viem";
import { StateError } from "@curvefund/shared";
import type { UnitOfWork } from "../runtime/unit-of-work.js";
import type { Campaign } from "./types.js";

export class CampaignStore {
  private readonly campaigns: Map<number, Campaign> = new Map();
  private readonly investments: Map<number, Map<Address, bigint>> = new Map();
  private readonly byCreator: Map<Address, number[]> = new Map();
  private readonly byInvestor: Map<Address, number[]> = new Map();
  private lastId = 0;

  nextId(): number {
    return this.lastId + 1;
  }

  insert(campaign: Campaign): void {
    if (campaign.id !== this.nextId()) {
      throw new Error(`Campaign id ${campaign.id} is out of sequence, expected ${this.nextId()}`);
    }
    this.campaigns.set(campaign.id, campaign);
    this.investments.set(campaign.id, new Map());
    this.index(this.byCreator, campaign.creator, campaign.id);
    this.lastId = campaign.id;
  }

  get(id: number): Campaign | undefined {
    return this.campaigns.get(id);
  }

  require(id: number): Campaign {
    const campaign = this.campaigns.get(id);
    if (!campaign) {
      throw new StateError(`Campaign ${id} not found`, "not_found");
    }
    return campaign;
  }

  list(): Campaign[] {
    return Array.from(this.campaigns.values());
  }

  idsByCreator(creator: Address): number[] {
    return [...(this.byCreator.get(getAddress(creator)) ?? [])];
  }

  idsByInvestor(investor: Address): number[] {
    return [...(this.byInvestor.get(getAddress(investor)) ?? [])];
  }

  // ============================================
  // INVESTMENTS
  // ============================================

  /**
   * Add `amount` to the investor's contribution, journaling the previous value
   */
  addInvestment(id: number, investorInput: Address, amount: bigint, uow: UnitOfWork): bigint {
    const investor = getAddress(investorInput);
    const book = this.book(id);
    const previous = book.get(investor);
    const total = (previous ?? 0n) + amount;
    book.set(investor, total);

    if (previous === undefined) {
      const ids = this.index(this.byInvestor, investor, id);
      uow.onRollback(`remove investment ${id}:${investor}`, () => {
        book.delete(investor);
        ids.pop();
      });
    } else {
      uow.onRollback(`restore investment ${id}:${investor}`, () => {
        book.set(investor, previous);
      });
    }

    return total;
  }

  getInvestment(id: number, investor: Address): bigint {
    return this.book(id).get(getAddress(investor)) ?? 0n;
  }

  /**
   * Investors in first-purchase order with their contributions
   */
  getInvestments(id: number): Array<[Address, bigint]> {
    return Array.from(this.book(id).entries());
  }

  private book(id: number): Map<Address, bigint> {
    const book = this.investments.get(id);
    if (!book) {
      throw new StateError(`Campaign ${id} not found`, "not_found");
    }
    return book;
  }

  private index(map: Map<Address, number[]>, address: Address, id: number): number[] {
    const key = getAddress(address);
    const ids = map.get(key) ?? [];
    ids.push(id);
    map.set(key, ids);
    return ids;
  }
}
