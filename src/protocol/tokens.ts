/**
 * Token registry
 * The operator's token list, with lookup by id, symbol or address
 */

import type { Address, TokenInfo } from '../core/types.js';
import { isAddress } from '../core/address.js';
import { parseUnits, formatUnits } from '../core/units.js';
import { ValidationError, InvalidAmountError } from '../wallet/errors.js';

/** Fungible tokens use ids 0..65535, NFTs everything above */
export const MAX_FUNGIBLE_TOKEN_ID = 65_535;
export const MIN_NFT_TOKEN_ID = 65_536;
export const MAX_TOKEN_ID = 0xffff_ffff;

export type TokenLike = number | string;

export function isFungibleTokenId(id: number): boolean {
  return Number.isInteger(id) && id >= 0 && id <= MAX_FUNGIBLE_TOKEN_ID;
}

export function isNFTTokenId(id: number): boolean {
  return Number.isInteger(id) && id >= MIN_NFT_TOKEN_ID && id <= MAX_TOKEN_ID;
}

export interface TokenSource {
  getTokens(options?: { signal?: AbortSignal }): Promise<TokenInfo[]>;
}

/**
 * Lazily loaded view of the operator's tokens.
 *
 * ```typescript
 * const tokens = new TokenRegistry(operator);
 * const eth = await tokens.resolve('ETH');
 * const amount = await tokens.parse('1.5', 'ETH');
 * ```
 */
export class TokenRegistry {
  private readonly source: TokenSource;
  private byId = new Map<number, TokenInfo>();
  private bySymbol = new Map<string, TokenInfo>();
  private byAddress = new Map<string, TokenInfo>();
  private loading: Promise<void> | null = null;
  private loaded = false;

  constructor(source: TokenSource) {
    this.source = source;
  }

  /**
   * Fetch the token list once; concurrent callers share the request
   */
  async load(force = false): Promise<void> {
    if (this.loaded && !force) return;
    if (this.loading === null || force) {
      this.loading = this.fetch().finally(() => {
        this.loading = null;
      });
    }
    await this.loading;
  }

  /**
   * Tokens given up front, e.g. from configuration or tests
   */
  register(tokens: readonly TokenInfo[]): void {
    for (const token of tokens) {
      this.byId.set(token.id, token);
      this.bySymbol.set(token.symbol.toUpperCase(), token);
      this.byAddress.set(token.address.toLowerCase(), token);
    }
    this.loaded = this.loaded || tokens.length > 0;
  }

  /**
   * Synchronous lookup among loaded tokens
   */
  find(token: TokenLike): TokenInfo | undefined {
    if (typeof token === 'number') {
      return this.byId.get(token);
    }
    if (isAddress(token)) {
      return this.byAddress.get(token.toLowerCase());
    }
    return this.bySymbol.get(token.toUpperCase());
  }

  async resolve(token: TokenLike): Promise<TokenInfo> {
    await this.load();
    const info = this.find(token);
    if (info === undefined) {
      throw new ValidationError({
        code: 'UNKNOWN_TOKEN',
        message: `Token ${String(token)} is not supported by the operator`,
        details: { token },
        suggestion: 'Use a token id, symbol or address from the operator token list',
      });
    }
    return info;
  }

  /**
   * Parse a decimal amount in the token's units
   */
  async parse(amount: string, token: TokenLike): Promise<bigint> {
    const info = await this.resolve(token);
    try {
      return parseUnits(amount, info.decimals);
    } catch (error) {
      throw new InvalidAmountError('amount', amount, error instanceof Error ? error.message : String(error));
    }
  }

  async format(amount: bigint, token: TokenLike): Promise<string> {
    const info = await this.resolve(token);
    return formatUnits(amount, info.decimals);
  }

  list(): TokenInfo[] {
    return [...this.byId.values()].sort((a, b) => a.id - b.id);
  }

  addressOf(token: TokenLike): Address | undefined {
    return this.find(token)?.address;
  }

  private async fetch(): Promise<void> {
    const tokens = await this.source.getTokens();
    this.byId = new Map();
    this.bySymbol = new Map();
    this.byAddress = new Map();
    this.register(tokens);
    this.loaded = true;
  }
}
