import { getAddress } from 'viem';
import type { Address } from 'viem';

import type { FarmDeployment, RewardTokenService, StakedAssetService } from '../../../sdk/src/index.js';
import { InvalidAmount } from '../../../sdk/src/index.js';

import type { FarmServices } from '../engine/context.js';
import { MintRejected } from '../errors.js';
import type { FarmDb } from '../storage/db.js';

export interface TokenInfo {
  address: Address;
  symbol: string;
  // Only this account may mint. Tokens without a minter are funded through credit().
  minter?: Address;
  totalSupply: bigint;
}

type TokenRow = { address: string; symbol: string; minter: string | null; total_supply: string };

function expectNonNegative(label: string, amount: bigint): void {
  if (amount < 0n) throw new InvalidAmount(label, amount);
}

/**
 * Fungible token balances kept in the farm database, so token movements share
 * the enclosing action's transaction and roll back with it.
 */
export class TokenLedger {
  private readonly db: FarmDb;
  private readonly insertTokenStmt;
  private readonly selectTokenStmt;
  private readonly supplyStmt;
  private readonly balanceStmt;
  private readonly setBalanceStmt;
  private readonly allowanceStmt;
  private readonly setAllowanceStmt;

  constructor(db: FarmDb) {
    this.db = db;
    const raw = db.raw();
    this.insertTokenStmt = raw.prepare<[string, string, string | null, string]>(
      `INSERT INTO tokens(address, symbol, minter, total_supply) VALUES(?, ?, ?, ?)`,
    );
    this.selectTokenStmt = raw.prepare<[string], TokenRow>(`SELECT * FROM tokens WHERE address = ?`);
    this.supplyStmt = raw.prepare<[string, string]>(`UPDATE tokens SET total_supply = ? WHERE address = ?`);
    this.balanceStmt = raw.prepare<[string, string], { amount: string }>(
      `SELECT amount FROM token_balances WHERE token = ? AND holder = ?`,
    );
    this.setBalanceStmt = raw.prepare<[string, string, string]>(
      `INSERT INTO token_balances(token, holder, amount) VALUES(?, ?, ?)
       ON CONFLICT(token, holder) DO UPDATE SET amount = excluded.amount`,
    );
    this.allowanceStmt = raw.prepare<[string, string, string], { amount: string }>(
      `SELECT amount FROM token_allowances WHERE token = ? AND owner = ? AND spender = ?`,
    );
    this.setAllowanceStmt = raw.prepare<[string, string, string, string]>(
      `INSERT INTO token_allowances(token, owner, spender, amount) VALUES(?, ?, ?, ?)
       ON CONFLICT(token, owner, spender) DO UPDATE SET amount = excluded.amount`,
    );
  }

  register(args: { address: Address; symbol: string; minter?: Address }): TokenInfo {
    const address = getAddress(args.address);
    if (this.get(address)) throw new Error(`token already registered: ${address}`);
    const minter = args.minter ? getAddress(args.minter) : undefined;
    this.insertTokenStmt.run(address, args.symbol, minter ?? null, '0');
    return { address, symbol: args.symbol, minter, totalSupply: 0n };
  }

  get(token: Address): TokenInfo | undefined {
    const row = this.selectTokenStmt.get(getAddress(token));
    if (!row) return undefined;
    return {
      address: getAddress(row.address),
      symbol: row.symbol,
      minter: row.minter === null ? undefined : getAddress(row.minter),
      totalSupply: BigInt(row.total_supply),
    };
  }

  require(token: Address): TokenInfo {
    const info = this.get(token);
    if (!info) throw new Error(`unknown token: ${token}`);
    return info;
  }

  balanceOf(token: Address, holder: Address): bigint {
    const row = this.balanceStmt.get(getAddress(token), getAddress(holder));
    return row ? BigInt(row.amount) : 0n;
  }

  totalSupply(token: Address): bigint {
    return this.require(token).totalSupply;
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    const row = this.allowanceStmt.get(getAddress(token), getAddress(owner), getAddress(spender));
    return row ? BigInt(row.amount) : 0n;
  }

  approve(token: Address, owner: Address, spender: Address, amount: bigint): void {
    expectNonNegative('allowance', amount);
    this.require(token);
    this.setAllowanceStmt.run(getAddress(token), getAddress(owner), getAddress(spender), amount.toString());
  }

  /** Creates supply out of nothing. Refused for tokens that have a minter. */
  credit(token: Address, holder: Address, amount: bigint): void {
    const info = this.require(token);
    if (info.minter) throw new Error(`token ${info.address} is minted by ${info.minter}; credit is not allowed`);
    this.issue(info, holder, amount);
  }

  mint(token: Address, caller: Address, recipient: Address, amount: bigint): void {
    const info = this.require(token);
    if (!info.minter || info.minter !== getAddress(caller)) throw new MintRejected(info.address, getAddress(caller));
    this.issue(info, recipient, amount);
  }

  /** Moves exactly `amount`, or nothing and returns false. */
  move(token: Address, from: Address, to: Address, amount: bigint): boolean {
    expectNonNegative('transfer amount', amount);
    this.require(token);
    if (amount === 0n) return true;
    const fromBal = this.balanceOf(token, from);
    if (fromBal < amount) return false;
    this.db.atomic(() => {
      this.setBalanceStmt.run(getAddress(token), getAddress(from), (fromBal - amount).toString());
      this.setBalanceStmt.run(getAddress(token), getAddress(to), (this.balanceOf(token, to) + amount).toString());
    });
    return true;
  }

  moveFrom(token: Address, spender: Address, owner: Address, to: Address, amount: bigint): boolean {
    expectNonNegative('transfer amount', amount);
    const allowed = this.allowance(token, owner, spender);
    if (allowed < amount) return false;
    return this.db.atomic(() => {
      if (!this.move(token, owner, to, amount)) return false;
      this.setAllowanceStmt.run(getAddress(token), getAddress(owner), getAddress(spender), (allowed - amount).toString());
      return true;
    });
  }

  connect(token: Address, holder: Address): ConnectedToken {
    return new ConnectedToken(this, this.require(token).address, getAddress(holder));
  }

  private issue(info: TokenInfo, holder: Address, amount: bigint): void {
    expectNonNegative('mint amount', amount);
    if (amount === 0n) return;
    this.db.atomic(() => {
      this.setBalanceStmt.run(info.address, getAddress(holder), (this.balanceOf(info.address, holder) + amount).toString());
      this.supplyStmt.run((this.totalSupply(info.address) + amount).toString(), info.address);
    });
  }
}

/** A token seen from one account: transfers and mints are made as `holder`. */
export class ConnectedToken implements StakedAssetService, RewardTokenService {
  constructor(
    private readonly ledger: TokenLedger,
    public readonly address: Address,
    public readonly holder: Address,
  ) {}

  balanceOf(holder: Address): bigint {
    return this.ledger.balanceOf(this.address, holder);
  }

  transfer(recipient: Address, amount: bigint): boolean {
    return this.ledger.move(this.address, this.holder, recipient, amount);
  }

  transferFrom(owner: Address, recipient: Address, amount: bigint): boolean {
    return this.ledger.moveFrom(this.address, this.holder, owner, recipient, amount);
  }

  approve(spender: Address, amount: bigint): boolean {
    this.ledger.approve(this.address, this.holder, spender, amount);
    return true;
  }

  mint(recipient: Address, amount: bigint): void {
    this.ledger.mint(this.address, this.holder, recipient, amount);
  }
}

// Services bound to the farm's custody account.
export function ledgerServices(ledger: TokenLedger, deployment: FarmDeployment): FarmServices {
  return {
    stakedAsset: (asset) => ledger.connect(asset, deployment.custody),
    rewardToken: () => ledger.connect(deployment.rewardToken, deployment.custody),
  };
}
