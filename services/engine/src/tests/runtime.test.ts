/**
 * Runtime Tests
 *
 * - Unit of work compensation order
 * - Serial operation queue and reentrancy
 * - Collaborator error wrapping
 * - Exact return of vault forwards on rollback
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CollaboratorError, StateError } from "@curvefund/shared";
import {
  OperationQueue,
  UnitOfWork,
  callCollaborator,
  forwardToVault,
  runAtomically,
} from "../runtime/index.js";
import type { Address } from "viem";
import { InMemorySettlementAsset, InMemoryYieldVault } from "../collaborators/index.js";
import { addr } from "./helpers.js";

describe("UnitOfWork", () => {
  it("should compensate in reverse order", async () => {
    const uow = new UnitOfWork("test");
    const order: string[] = [];
    uow.onRollback("first", () => {
      order.push("first");
    });
    uow.onRollback("second", () => {
      order.push("second");
    });

    const report = await uow.rollback();

    expect(order).toEqual(["second", "first"]);
    expect(report.compensated).toBe(2);
    expect(report.failures).toEqual([]);
  });

  it("should restore fields assigned through set", async () => {
    const record = { count: 1, label: "a" };
    const uow = new UnitOfWork("test");
    uow.set(record, "count", 2);
    uow.set(record, "label", "b");

    expect(record).toEqual({ count: 2, label: "b" });
    await uow.rollback();
    expect(record).toEqual({ count: 1, label: "a" });
  });

  it("should keep compensating after one compensation fails", async () => {
    const uow = new UnitOfWork("test");
    let restored = false;
    uow.onRollback("restore", () => {
      restored = true;
    });
    uow.onRollback("broken", () => {
      throw new Error("boom");
    });

    const report = await uow.rollback();

    expect(restored).toBe(true);
    expect(report.failures).toEqual([{ label: "broken", error: "boom" }]);
  });

  it("should refuse new entries once closed", () => {
    const uow = new UnitOfWork("test");
    uow.commit();
    expect(() => uow.onRollback("late", () => undefined)).toThrow();
  });
});

describe("runAtomically", () => {
  it("should roll back and rethrow the original error", async () => {
    const state = { value: 0 };
    const failure = new StateError("stop", "expired");

    await expect(
      runAtomically("op", async (uow) => {
        uow.set(state, "value", 5);
        throw failure;
      })
    ).rejects.toBe(failure);
    expect(state.value).toBe(0);
  });

  it("should keep effects of a successful operation", async () => {
    const state = { value: 0 };
    const result = await runAtomically("op", async (uow) => {
      uow.set(state, "value", 5);
      return "done";
    });

    expect(result).toBe("done");
    expect(state.value).toBe(5);
  });
});

describe("OperationQueue", () => {
  it("should run operations one at a time in submission order", async () => {
    const queue = new OperationQueue();
    const log: string[] = [];

    const slow = queue.run("slow", async () => {
      log.push("slow:start");
      await new Promise((resolve) => setTimeout(resolve, 10));
      log.push("slow:end");
    });
    const fast = queue.run("fast", async () => {
      log.push("fast");
    });

    await Promise.all([slow, fast]);
    expect(log).toEqual(["slow:start", "slow:end", "fast"]);
  });

  it("should reject a nested operation without running it", async () => {
    const queue = new OperationQueue();
    let ran = false;

    const nested = await queue.run("outer", async () =>
      queue.run("inner", async () => {
        ran = true;
      }).catch((e: unknown) => e)
    );

    expect(nested).toBeInstanceOf(StateError);
    expect(nested).toMatchObject({ reason: "reentrant", message: "inner cannot run inside outer" });
    expect(ran).toBe(false);
    expect(queue.current()).toBeUndefined();
    await expect(queue.run("after", async () => queue.current())).resolves.toBe("after");
  });

  it("should propagate rejections", async () => {
    const queue = new OperationQueue();
    await expect(queue.run("fail", async () => {
      throw new Error("nope");
    })).rejects.toThrow("nope");
    expect(queue.pending).toBe(0);
  });
});

describe("callCollaborator", () => {
  it("should wrap foreign errors", async () => {
    const error = await callCollaborator("vault", "deposit", async () => {
      throw new Error("paused");
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CollaboratorError);
    expect(error).toMatchObject({
      message: "vault.deposit failed: paused",
      collaborator: "vault",
    });
  });

  it("should pass engine errors through", async () => {
    const failure = new StateError("gone", "not_found");
    await expect(callCollaborator("vault", "deposit", async () => {
      throw failure;
    })).rejects.toBe(failure);
  });
});

describe("forwardToVault", () => {
  const HOLDER = addr(0xc1);
  const FROM = addr(0xc2);
  const RECEIVER = addr(0xc3);

  let asset: InMemorySettlementAsset;
  let vault: InMemoryYieldVault;

  // 1,000 shares backed by 1,007 assets: new deposits mint rounded-down shares
  beforeEach(async () => {
    asset = new InMemorySettlementAsset(addr(0xb1));
    vault = new InMemoryYieldVault(asset, addr(0xb2));
    asset.mint(vault.address, 1007n);
    await vault.deposit(1000n, HOLDER);
    await vault.accrueYield(7n);
    asset.mint(FROM, 100n);
  });

  function forward(uow: UnitOfWork, receiver: Address, absorber?: Address) {
    return forwardToVault(uow, { asset, vault, from: FROM, receiver, amount: 100n, label: "fee", absorber });
  }

  it("should withdraw the exact amount from a receiver that holds enough", async () => {
    const uow = new UnitOfWork("test");
    expect(await forward(uow, HOLDER)).toBe(99n);

    const report = await uow.rollback();

    expect(report.failures).toEqual([]);
    expect(await asset.balanceOf(FROM)).toBe(100n);
    expect(await vault.balanceOf(HOLDER)).toBe(999n);
    expect(await vault.totalAssets()).toBe(1007n);
  });

  it("should cover the rounding shortfall from the absorber", async () => {
    const uow = new UnitOfWork("test");
    expect(await forward(uow, RECEIVER, HOLDER)).toBe(99n);

    const report = await uow.rollback();

    expect(report.failures).toEqual([]);
    expect(await asset.balanceOf(FROM)).toBe(100n);
    expect(await vault.balanceOf(RECEIVER)).toBe(0n);
    expect(await vault.balanceOf(HOLDER)).toBe(999n);
    expect(await vault.totalAssets()).toBe(1007n);
  });

  it("should report the shortfall when no absorber is named", async () => {
    const uow = new UnitOfWork("test");
    await forward(uow, RECEIVER);

    const report = await uow.rollback();

    expect(report.failures).toEqual([
      { label: "return fee", error: `Position of ${RECEIVER} returned 99 of 100` },
    ]);
    expect(await asset.balanceOf(FROM)).toBe(99n);
    expect(await vault.balanceOf(RECEIVER)).toBe(0n);
  });
});
