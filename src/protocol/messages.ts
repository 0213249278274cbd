/**
 * Human-readable base-chain signing messages
 *
 * The L1 key vouches for a rollup transaction by signing one of these with
 * personal-sign. ChangePubKey embeds the new key hash, nonce and account id so
 * that a signature can never be replayed for another key or nonce.
 */

import type { PubKeyHash } from '../core/types.js';
import { formatUnitsFixed } from '../core/units.js';
import type { ChangePubKey, RollupTransaction } from './transaction.js';
import { feeTokenOf } from './transaction.js';

export interface TokenDisplay {
  readonly symbol: string;
  readonly decimals: number;
}

/**
 * Token id -> display info; unknown ids render as raw units
 */
export type TokenDisplayLookup = (tokenId: number) => TokenDisplay | undefined;

const hex8 = (value: number): string => value.toString(16).padStart(8, '0');

export function changePubKeyMessage(newPkHash: PubKeyHash, nonce: number, accountId: number): string {
  return (
    'Register rollup pubkey:\n\n' +
    `${newPkHash.slice(4).toLowerCase()}\n` +
    `nonce: 0x${hex8(nonce)}\n` +
    `account id: 0x${hex8(accountId)}\n\n` +
    'Only sign this message for a trusted client!'
  );
}

function formatToken(amount: bigint, tokenId: number, tokens: TokenDisplayLookup): string {
  const display = tokens(tokenId);
  if (display === undefined) {
    return `${amount} #${tokenId}`;
  }
  return `${formatUnitsFixed(amount, display.decimals)} ${display.symbol}`;
}

function actionLine(tx: Exclude<RollupTransaction, ChangePubKey>, tokens: TokenDisplayLookup): string {
  switch (tx.type) {
    case 'Transfer':
      return `Transfer ${formatToken(tx.amount, tx.token, tokens)} to: ${tx.to.toLowerCase()}`;
    case 'Withdraw':
      return `Withdraw ${formatToken(tx.amount, tx.token, tokens)} to: ${tx.to.toLowerCase()}`;
    case 'ForcedExit':
      return `ForcedExit ${tokens(tx.token)?.symbol ?? `#${tx.token}`} to: ${tx.target.toLowerCase()}`;
    case 'MintNFT':
      return `MintNFT ${tx.contentHash} for: ${tx.recipient.toLowerCase()}`;
    case 'WithdrawNFT':
      return `WithdrawNFT ${tx.token} to: ${tx.to.toLowerCase()}`;
    case 'Swap':
      return `Swap ${formatToken(tx.amounts[0], tx.orders[0].tokenSell, tokens)} for ${formatToken(tx.amounts[1], tx.orders[1].tokenSell, tokens)}`;
  }
}

/**
 * Message the L1 key signs for `tx`
 */
export function transactionMessage(tx: RollupTransaction, tokens: TokenDisplayLookup): string {
  if (tx.type === 'ChangePubKey') {
    return changePubKeyMessage(tx.newPkHash, tx.nonce, tx.accountId);
  }

  const lines = [actionLine(tx, tokens)];
  if (tx.fee > 0n) {
    lines.push(`Fee: ${formatToken(tx.fee, feeTokenOf(tx), tokens)}`);
  }
  lines.push(`Nonce: ${tx.nonce}`);
  return lines.join('\n');
}
