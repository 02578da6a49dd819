/**
 * Issued Token
 *
 * The token a campaign sells. Only its minter (the ledger) may mint or burn.
 */

import { isAddressEqual, type Address } from "viem";
import { TOKEN_DECIMALS, AuthorizationError } from "@curvefund/shared";
import type { TransferableAsset } from "../collaborators/types.js";

export interface IssuedTokenMetadata {
  address: Address;
  name: string;
  symbol: string;
  minter: Address;
}

export class IssuedToken implements TransferableAsset {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals = TOKEN_DECIMALS;
  readonly minter: Address;

  private readonly balances: Map<Address, bigint> = new Map();
  private supply = 0n;

  constructor(metadata: IssuedTokenMetadata) {
    this.address = metadata.address;
    this.name = metadata.name;
    this.symbol = metadata.symbol;
    this.minter = metadata.minter;
  }

  async mint(caller: Address, to: Address, amount: bigint): Promise<void> {
    this.assertMinter(caller);
    if (amount <= 0n) {
      throw new Error("Mint amount must be positive");
    }
    this.balances.set(to, this.read(to) + amount);
    this.supply += amount;
  }

  async burn(caller: Address, from: Address, amount: bigint): Promise<void> {
    this.assertMinter(caller);
    const held = this.read(from);
    if (amount <= 0n || held < amount) {
      throw new Error(`Cannot burn ${amount} from ${from}: held=${held}`);
    }
    this.balances.set(from, held - amount);
    this.supply -= amount;
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<void> {
    const held = this.read(from);
    if (amount < 0n || held < amount) {
      throw new Error(`Insufficient ${this.symbol} for ${from}: held=${held}, requested=${amount}`);
    }
    this.balances.set(from, held - amount);
    this.balances.set(to, this.read(to) + amount);
  }

  async balanceOf(account: Address): Promise<bigint> {
    return this.read(account);
  }

  totalSupply(): bigint {
    return this.supply;
  }

  private assertMinter(caller: Address): void {
    if (!isAddressEqual(caller, this.minter)) {
      throw new AuthorizationError(`${caller} is not the minter of ${this.symbol}`, caller);
    }
  }

  private read(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }
}
