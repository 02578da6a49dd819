/**
 * Campaign Ledger
 *
 * Owns campaigns from creation to a terminal state:
 *   active -> funding_complete (goal reached or sale allocation sold out)
 *   active -> cancelled (administrator)
 *
 * Every mutating operation runs on the shared operation queue inside a unit of
 * work. Guards are checked and flipped before the first collaborator call; any
 * collaborator failure rolls back the whole operation. Events fire only after
 * the operation commits.
 */

import { EventEmitter } from "eventemitter3";
import pRetry from "p-retry";
import {
  getAddress,
  getContractAddress,
  isAddress,
  isAddressEqual,
  type Address,
} from "viem";
import {
  engineLogger as logger,
  audit,
  logFundMovement,
  campaignParamsSchema,
  CAMPAIGN_STATUS,
  LIQUIDITY_FAILURE_POLICIES,
  BPS_DENOMINATOR,
  AuthorizationError,
  StateError,
  ValidationError,
  type CampaignParamsInput,
  type CampaignStatus,
} from "@curvefund/shared";
import type { Collaborators } from "../collaborators/types.js";
import { FundAllocator } from "../allocation/fund-allocator.js";
import { averagePrice, currentPrice, purchaseReturn } from "../pricing/pricing-curve.js";
import type { PurchaseQuote } from "../pricing/types.js";
import { runAtomically, type UnitOfWork } from "../runtime/unit-of-work.js";
import {
  callCollaborator,
  forwardToVault,
  transferWithRollback,
} from "../runtime/collaborator-call.js";
import type { OperationQueue } from "../runtime/operation-queue.js";
import type { VestingSchedule } from "../vesting/vesting-schedule.js";
import { CampaignStore } from "./campaign-store.js";
import { IssuedToken } from "./issued-token.js";
import type {
  Campaign,
  CampaignLedgerEvents,
  CampaignProgress,
  CompletionSummary,
  LedgerConfig,
  LiquidityResult,
  PointsSweep,
  PurchaseReceipt,
  SponsorshipReceipt,
} from "./types.js";

const ledgerLogger = logger.child({ component: "campaign-ledger" });

export interface CampaignLedgerDeps {
  collaborators: Collaborators;
  queue: OperationQueue;
  vesting: VestingSchedule;
  allocator?: FundAllocator;
}

export interface BuyQuote extends PurchaseQuote {
  points: bigint;
}

export interface CampaignFilter {
  status?: CampaignStatus;
  creator?: Address;
}

type DeferredEvent = () => void;

function toAddress(value: string, field: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new ValidationError(`Invalid address for ${field}: ${value}`, field);
  }
  return getAddress(value);
}

export function campaignStatus(campaign: Campaign): CampaignStatus {
  if (campaign.cancelled) return CAMPAIGN_STATUS.CANCELLED;
  if (campaign.fundingComplete) return CAMPAIGN_STATUS.FUNDING_COMPLETE;
  return CAMPAIGN_STATUS.ACTIVE;
}

// ============================================
// CAMPAIGN LEDGER
// ============================================

export class CampaignLedger extends EventEmitter<CampaignLedgerEvents> {
  private readonly config: LedgerConfig;
  private readonly collaborators: Collaborators;
  private readonly queue: OperationQueue;
  private readonly vesting: VestingSchedule;
  private readonly allocator: FundAllocator;

  private readonly store = new CampaignStore();
  private readonly tokens: Map<number, IssuedToken> = new Map();

  constructor(deps: CampaignLedgerDeps, config: LedgerConfig) {
    super();
    this.collaborators = deps.collaborators;
    this.queue = deps.queue;
    this.vesting = deps.vesting;
    this.allocator = deps.allocator ?? new FundAllocator();
    this.config = {
      ...config,
      ledgerAddress: getAddress(config.ledgerAddress),
      platformTreasury: getAddress(config.platformTreasury),
      admin: getAddress(config.admin),
    };

    ledgerLogger.info({
      ledger: this.config.ledgerAddress,
      liquidityFailurePolicy: this.config.liquidityFailurePolicy,
      liquidityRetries: this.config.liquidityRetries,
    }, "CampaignLedger initialized");
  }

  get address(): Address {
    return this.config.ledgerAddress;
  }

  // ============================================
  // CREATE
  // ============================================

  /**
   * Register a new campaign and its token. Nothing is minted until purchases.
   */
  create(creatorInput: Address, params: CampaignParamsInput): Campaign {
    const creator = toAddress(creatorInput, "creator");
    const parsed = campaignParamsSchema.safeParse(params);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue ? issue.path.join(".") : undefined;
      throw new ValidationError(issue ? `${field}: ${issue.message}` : "Invalid campaign parameters", field);
    }
    const input = parsed.data;
    const now = Date.now();

    const {
      minTargetFunding,
      maxTargetFunding,
      minTotalSupply,
      maxTotalSupply,
      minDurationMs,
      maxDurationMs,
    } = this.config;

    if (input.targetFunding < minTargetFunding || input.targetFunding > maxTargetFunding) {
      throw new ValidationError(
        `Target funding must be within [${minTargetFunding}, ${maxTargetFunding}]`,
        "targetFunding"
      );
    }
    if (input.totalSupply < minTotalSupply || input.totalSupply > maxTotalSupply) {
      throw new ValidationError(
        `Total supply must be within [${minTotalSupply}, ${maxTotalSupply}]`,
        "totalSupply"
      );
    }
    const duration = input.deadline - now;
    if (duration < minDurationMs || duration > maxDurationMs) {
      throw new ValidationError(
        `Campaign duration must be within [${minDurationMs}, ${maxDurationMs}] ms`,
        "deadline"
      );
    }

    const { allocations } = this.allocator.tokenAllocations(input.totalSupply);
    averagePrice(allocations.sale, input.targetFunding);

    const id = this.store.nextId();
    const tokenAddress = getContractAddress({
      from: this.config.ledgerAddress,
      nonce: BigInt(id),
    });
    const token = new IssuedToken({
      address: tokenAddress,
      name: input.name,
      symbol: input.symbol,
      minter: this.config.ledgerAddress,
    });

    const campaign: Campaign = {
      id,
      creator,
      token: tokenAddress,
      name: input.name,
      symbol: input.symbol,
      description: input.description,
      targetFunding: input.targetFunding,
      amountRaised: 0n,
      totalSupply: input.totalSupply,
      tokensForSale: allocations.sale,
      tokensSold: 0n,
      creatorAllocation: allocations.creator,
      liquidityAllocation: allocations.liquidity,
      platformAllocation: allocations.platform,
      reserveRatio: input.reserveRatio,
      deadline: input.deadline,
      createdAt: now,
      completedAt: null,
      active: true,
      fundingComplete: false,
      cancelled: false,
      sponsored: false,
      pointsBank: 0n,
      initialPointsBank: 0n,
      liquidityPool: null,
      liquidityStatus: "none",
      liquidityReserve: 0n,
      vestingId: null,
    };

    this.store.insert(campaign);
    this.tokens.set(id, token);

    ledgerLogger.info({
      campaignId: id,
      creator,
      token: tokenAddress,
      symbol: input.symbol,
      targetFunding: input.targetFunding.toString(),
      tokensForSale: allocations.sale.toString(),
    }, "Campaign created");

    const snapshot = { ...campaign };
    this.emit("campaign:created", snapshot);
    return snapshot;
  }

  // ============================================
  // SPONSOR
  // ============================================

  /**
   * Creator pays the sponsorship fee to the platform treasury's vault position
   * and the campaign receives its points bank.
   */
  async sponsor(id: number, callerInput: Address): Promise<SponsorshipReceipt> {
    const caller = toAddress(callerInput, "caller");

    const receipt = await this.queue.run("sponsor", () =>
      runAtomically(`sponsor:${id}`, async (uow) => {
        const campaign = this.store.require(id);
        if (!isAddressEqual(caller, campaign.creator)) {
          throw new AuthorizationError(`Only the creator can sponsor campaign ${id}`, caller);
        }
        this.assertOpen(campaign);
        if (campaign.sponsored) {
          throw new StateError(`Campaign ${id} is already sponsored`, "already_sponsored");
        }

        const fee = this.config.sponsorshipFee;
        uow.set(campaign, "sponsored", true);
        uow.set(campaign, "pointsBank", this.config.pointsBank);
        uow.set(campaign, "initialPointsBank", this.config.pointsBank);

        let vaultShares = 0n;
        if (fee > 0n) {
          const { asset, vault } = this.collaborators;
          vaultShares = await forwardToVault(uow, {
            asset,
            vault,
            from: campaign.creator,
            receiver: this.config.platformTreasury,
            amount: fee,
            label: "sponsorship fee",
          });
        }

        logFundMovement("info", "sponsorship_fee_paid", {
          campaignId: id,
          from: campaign.creator,
          to: this.config.platformTreasury,
          amount: fee,
          stream: "fee",
        });

        const result: SponsorshipReceipt = {
          campaignId: id,
          fee,
          pointsBank: campaign.pointsBank,
          vaultShares,
        };
        return result;
      })
    );

    this.emit("campaign:sponsored", receipt);
    return receipt;
  }

  // ============================================
  // BUY
  // ============================================

  /**
   * Buy tokens along the curve. The purchase that reaches the goal or sells out
   * the sale allocation also completes the campaign.
   */
  async buy(id: number, buyerInput: Address, amountIn: bigint): Promise<PurchaseReceipt> {
    const buyer = toAddress(buyerInput, "buyer");
    if (amountIn <= 0n) {
      throw new ValidationError("Purchase amount must be positive", "amountIn");
    }

    const events: DeferredEvent[] = [];
    const receipt = await this.queue.run("buy", () =>
      runAtomically(`buy:${id}`, async (uow) => {
        const campaign = this.store.require(id);
        this.assertOpen(campaign);

        const quote = this.quoteFor(campaign, amountIn);
        if (quote.tokensOut === 0n) {
          throw new ValidationError(`Amount ${amountIn} buys zero tokens`, "amountIn");
        }

        // Effects
        uow.set(campaign, "amountRaised", campaign.amountRaised + quote.amountUsed);
        uow.set(campaign, "tokensSold", campaign.tokensSold + quote.tokensOut);
        if (quote.points > 0n) {
          uow.set(campaign, "pointsBank", campaign.pointsBank - quote.points);
        }
        this.store.addInvestment(id, buyer, quote.amountUsed, uow);

        const completed =
          campaign.tokensSold >= campaign.tokensForSale ||
          campaign.amountRaised >= campaign.targetFunding;
        if (completed) {
          this.markComplete(campaign, uow);
        }

        // Interactions
        const { asset, points } = this.collaborators;
        await transferWithRollback(uow, asset, buyer, this.config.ledgerAddress, quote.amountUsed, "purchase payment");

        if (quote.points > 0n) {
          await callCollaborator("points", "credit", () => points.credit(buyer, quote.points));
          uow.onRollback("debit purchase points", () => points.debit(buyer, quote.points));
        }

        await this.mint(uow, id, buyer, quote.tokensOut);

        logFundMovement("info", "purchase", {
          campaignId: id,
          from: buyer,
          to: this.config.ledgerAddress,
          amount: quote.amountUsed,
        });

        const result: PurchaseReceipt = {
          campaignId: id,
          buyer,
          tokensOut: quote.tokensOut,
          amountUsed: quote.amountUsed,
          refund: quote.refund,
          price: quote.price,
          points: quote.points,
          completed,
        };
        events.push(() => this.emit("campaign:purchase", result));

        if (completed) {
          const summary = await this.complete(campaign, buyer, uow, events);
          events.push(() => this.emit("campaign:completed", summary));
        }

        return result;
      })
    );

    for (const emit of events) {
      emit();
    }
    return receipt;
  }

  // ============================================
  // CANCEL
  // ============================================

  async cancel(id: number, callerInput: Address): Promise<Campaign> {
    const caller = toAddress(callerInput, "caller");
    if (!isAddressEqual(caller, this.config.admin)) {
      throw new AuthorizationError(`Only the administrator can cancel campaign ${id}`, caller);
    }

    const snapshot = await this.queue.run("cancel", async () => {
      const campaign = this.store.require(id);
      this.assertOpen(campaign, false);

      campaign.active = false;
      campaign.cancelled = true;

      audit({
        action: "campaign_cancelled",
        entityType: "campaign",
        entityId: String(id),
        actor: caller,
        details: { amountRaised: campaign.amountRaised.toString() },
      });

      return { ...campaign };
    });

    this.emit("campaign:cancelled", id, caller);
    return snapshot;
  }

  // ============================================
  // LIQUIDITY RETRY
  // ============================================

  /**
   * Provision a deferred liquidity pool. Permissionless; returns null when the
   * campaign has nothing pending.
   */
  async retryLiquidity(id: number): Promise<LiquidityResult | null> {
    const result = await this.queue.run("retryLiquidity", () =>
      runAtomically(`retryLiquidity:${id}`, async (uow) => {
        const campaign = this.store.require(id);
        if (campaign.liquidityStatus !== "pending") {
          return null;
        }
        return this.provisionLiquidity(campaign, uow);
      })
    );

    if (result) {
      this.emit("liquidity:provisioned", result);
    }
    return result;
  }

  // ============================================
  // QUERIES
  // ============================================

  getCampaign(id: number): Campaign | undefined {
    const campaign = this.store.get(id);
    return campaign ? { ...campaign } : undefined;
  }

  listCampaigns(filter: CampaignFilter = {}): Campaign[] {
    return this.store
      .list()
      .filter((c) => !filter.status || campaignStatus(c) === filter.status)
      .filter((c) => !filter.creator || isAddressEqual(c.creator, filter.creator))
      .map((c) => ({ ...c }));
  }

  getCampaignsByCreator(creator: Address): Campaign[] {
    return this.store
      .idsByCreator(toAddress(creator, "creator"))
      .map((id) => ({ ...this.store.require(id) }));
  }

  getInvestment(id: number, investor: Address): bigint {
    return this.store.getInvestment(id, toAddress(investor, "investor"));
  }

  getInvestorCampaigns(investor: Address): Campaign[] {
    return this.store
      .idsByInvestor(toAddress(investor, "investor"))
      .map((id) => ({ ...this.store.require(id) }));
  }

  getInvestors(id: number): Array<{ investor: Address; contributed: bigint }> {
    return this.store
      .getInvestments(id)
      .map(([investor, contributed]) => ({ investor, contributed }));
  }

  quoteBuy(id: number, amountIn: bigint): BuyQuote {
    const campaign = this.store.require(id);
    this.assertOpen(campaign);
    return this.quoteFor(campaign, amountIn);
  }

  currentPrice(id: number): bigint {
    const campaign = this.store.require(id);
    return currentPrice(campaign.tokensForSale, campaign.tokensSold, campaign.targetFunding);
  }

  getProgress(id: number): CampaignProgress {
    const campaign = this.store.require(id);
    const fundingBps = (campaign.amountRaised * BPS_DENOMINATOR) / campaign.targetFunding;

    return {
      id,
      status: campaignStatus(campaign),
      amountRaised: campaign.amountRaised,
      targetFunding: campaign.targetFunding,
      tokensSold: campaign.tokensSold,
      tokensForSale: campaign.tokensForSale,
      fundingBps: fundingBps > BPS_DENOMINATOR ? BPS_DENOMINATOR : fundingBps,
      remainingTokens: campaign.tokensForSale - campaign.tokensSold,
      currentPrice: this.currentPrice(id),
      timeRemainingMs: campaign.active ? Math.max(campaign.deadline - Date.now(), 0) : 0,
    };
  }

  getToken(id: number): IssuedToken {
    const token = this.tokens.get(id);
    if (!token) {
      throw new StateError(`Campaign ${id} not found`, "not_found");
    }
    return token;
  }

  getConfig(): LedgerConfig {
    return { ...this.config };
  }

  // ============================================
  // COMPLETION
  // ============================================

  private markComplete(campaign: Campaign, uow: UnitOfWork): void {
    uow.set(campaign, "active", false);
    uow.set(campaign, "fundingComplete", true);
    uow.set(campaign, "completedAt", Date.now());
  }

  /**
   * Pay out the raised funds and mint the fixed allocations.
   * Runs inside the triggering purchase; liquidity goes last because a
   * provisioned pool cannot be compensated.
   */
  private async complete(
    campaign: Campaign,
    trigger: Address,
    uow: UnitOfWork,
    events: DeferredEvent[]
  ): Promise<CompletionSummary> {
    const { asset, vault } = this.collaborators;
    const { ledgerAddress, platformTreasury } = this.config;
    const split = this.allocator.split(campaign.amountRaised);

    if (split.fee > 0n) {
      await forwardToVault(uow, {
        asset,
        vault,
        from: ledgerAddress,
        receiver: platformTreasury,
        amount: split.fee,
        label: "platform fee",
      });
    }

    if (split.vested > 0n) {
      const entry = await this.vesting.create({
        beneficiary: campaign.creator,
        amount: split.vested,
        durationMs: this.config.vestingDurationMs,
        funder: ledgerAddress,
        absorber: platformTreasury,
      }, uow);
      uow.set(campaign, "vestingId", entry.id);
    }

    await transferWithRollback(uow, asset, ledgerAddress, campaign.creator, split.instant, "instant payout");

    await this.mint(uow, campaign.id, campaign.creator, campaign.creatorAllocation);
    await this.mint(uow, campaign.id, platformTreasury, campaign.platformAllocation);
    await this.mint(uow, campaign.id, ledgerAddress, campaign.liquidityAllocation);

    const pointsSweep = await this.sweepPoints(campaign, trigger, uow);

    uow.set(campaign, "liquidityReserve", split.liquidity);
    await this.provisionOrDefer(campaign, uow, events);

    audit({
      action: "campaign_completed",
      entityType: "campaign",
      entityId: String(campaign.id),
      actor: trigger,
      details: {
        amountRaised: campaign.amountRaised.toString(),
        tokensSold: campaign.tokensSold.toString(),
        liquidityStatus: campaign.liquidityStatus,
      },
    });

    return {
      campaignId: campaign.id,
      amountRaised: campaign.amountRaised,
      split,
      vestingId: campaign.vestingId,
      pointsSweep,
      liquidityPool: campaign.liquidityPool,
      liquidityStatus: campaign.liquidityStatus,
      triggeredBy: trigger,
    };
  }

  /**
   * Credit the residual points bank to investors pro rata to contribution.
   * The flooring remainder goes to the purchaser who completed the campaign.
   */
  private async sweepPoints(
    campaign: Campaign,
    trigger: Address,
    uow: UnitOfWork
  ): Promise<PointsSweep | null> {
    const residual = campaign.pointsBank;
    if (!campaign.sponsored || residual === 0n) {
      return null;
    }

    const shares = new Map<Address, bigint>();
    let assigned = 0n;
    for (const [investor, contributed] of this.store.getInvestments(campaign.id)) {
      const share = (residual * contributed) / campaign.amountRaised;
      shares.set(investor, share);
      assigned += share;
    }
    shares.set(trigger, (shares.get(trigger) ?? 0n) + residual - assigned);

    uow.set(campaign, "pointsBank", 0n);

    const { points } = this.collaborators;
    const credits: PointsSweep["credits"] = [];
    for (const [investor, amount] of shares) {
      if (amount === 0n) continue;
      await callCollaborator("points", "credit", () => points.credit(investor, amount));
      uow.onRollback("debit swept points", () => points.debit(investor, amount));
      credits.push({ investor, points: amount });
    }

    ledgerLogger.info({
      campaignId: campaign.id,
      residual: residual.toString(),
      investors: credits.length,
    }, "Residual points bank swept");

    return { residual, credits };
  }

  private async provisionOrDefer(
    campaign: Campaign,
    uow: UnitOfWork,
    events: DeferredEvent[]
  ): Promise<void> {
    try {
      const result = await this.provisionLiquidity(campaign, uow);
      events.push(() => this.emit("liquidity:provisioned", result));
    } catch (error) {
      if (this.config.liquidityFailurePolicy !== LIQUIDITY_FAILURE_POLICIES.DEFER) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      uow.set(campaign, "liquidityStatus", "pending");

      ledgerLogger.warn({ campaignId: campaign.id, reason }, "Liquidity provisioning deferred");
      events.push(() => this.emit("liquidity:deferred", campaign.id, reason));
    }
  }

  /**
   * Push the escrowed settlement reserve and liquidity tokens to the provider
   * and create the pool. Each attempt undoes its own pushes when it fails.
   */
  private async provisionLiquidity(campaign: Campaign, uow: UnitOfWork): Promise<LiquidityResult> {
    const { asset, liquidity } = this.collaborators;
    const token = this.getToken(campaign.id);
    const settlementAmount = campaign.liquidityReserve;
    const tokenAmount = campaign.liquidityAllocation;
    const from = this.config.ledgerAddress;

    const pool = await pRetry(
      () =>
        runAtomically(`liquidity:${campaign.id}`, async (attempt) => {
          await transferWithRollback(attempt, asset, from, liquidity.address, settlementAmount, "liquidity settlement");
          await transferWithRollback(attempt, token, from, liquidity.address, tokenAmount, "liquidity tokens");
          return callCollaborator("liquidity", "provideLiquidity", () =>
            liquidity.provideLiquidity(token.address, asset.address, tokenAmount, settlementAmount)
          );
        }),
      {
        retries: this.config.liquidityRetries,
        minTimeout: this.config.liquidityRetryDelayMs,
        maxTimeout: this.config.liquidityRetryDelayMs * 10,
        onFailedAttempt: (error) => {
          ledgerLogger.warn({
            campaignId: campaign.id,
            attempt: error.attemptNumber,
            retriesLeft: error.retriesLeft,
            reason: error.message,
          }, "Liquidity provisioning attempt failed");
        },
      }
    );

    uow.set(campaign, "liquidityPool", pool);
    uow.set(campaign, "liquidityStatus", "provisioned");
    uow.set(campaign, "liquidityReserve", 0n);

    logFundMovement("info", "liquidity_provisioned", {
      campaignId: campaign.id,
      from,
      to: pool,
      amount: settlementAmount,
      stream: "liquidity",
    });

    return { campaignId: campaign.id, pool, settlementAmount, tokenAmount };
  }

  // ============================================
  // PRIVATE HELPERS
  // ============================================

  private quoteFor(campaign: Campaign, amountIn: bigint): BuyQuote {
    const quote = purchaseReturn(
      campaign.tokensForSale,
      campaign.tokensSold,
      campaign.targetFunding,
      amountIn
    );

    let points = 0n;
    if (campaign.sponsored && campaign.pointsBank > 0n) {
      points = (quote.tokensOut * campaign.initialPointsBank) / campaign.tokensForSale;
      if (points > campaign.pointsBank) {
        points = campaign.pointsBank;
      }
    }

    return { ...quote, points };
  }

  private async mint(uow: UnitOfWork, id: number, to: Address, amount: bigint): Promise<void> {
    if (amount === 0n) return;
    const token = this.getToken(id);
    const minter = this.config.ledgerAddress;
    await callCollaborator("token", "mint", () => token.mint(minter, to, amount));
    uow.onRollback(`burn ${token.symbol}`, () => token.burn(minter, to, amount));
  }

  /**
   * Terminal and expired campaigns reject purchases and sponsorship
   */
  private assertOpen(campaign: Campaign, checkDeadline = true): void {
    if (campaign.cancelled) {
      throw new StateError(`Campaign ${campaign.id} is cancelled`, "cancelled");
    }
    if (campaign.fundingComplete) {
      throw new StateError(`Campaign ${campaign.id} is already complete`, "already_complete");
    }
    if (checkDeadline && Date.now() >= campaign.deadline) {
      throw new StateError(`Campaign ${campaign.id} has expired`, "expired");
    }
  }
}

/**
 * Factory function
 */
export function createCampaignLedger(
  deps: CampaignLedgerDeps,
  config: LedgerConfig
): CampaignLedger {
  return new CampaignLedger(deps, config);
}
