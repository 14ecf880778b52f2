import BigNumber from 'bignumber.js';
import { ValidationError } from '../infra/errors';

export type ProfitBreakdown = {
  netProfit: BigNumber;
  grossSpread: BigNumber;
  flashFeeCost: BigNumber;
  totalFees: BigNumber;
  isProfitable: boolean;
};

function nonNegative(label: string, value: BigNumber.Value): BigNumber {
  const parsed = new BigNumber(value);
  if (!parsed.isFinite() || parsed.isNegative()) {
    throw new ValidationError(`${label} must be a finite non-negative amount`, { [label]: String(value) });
  }
  return parsed;
}

/**
 * Net result of one loan-funded round trip, all amounts in USD.
 *
 *   netProfit = grossOutput - loan - (bridgeFee + gasFee + loan * flashFeeRate)
 *
 * Zero is not profitable.
 */
export function computeNetProfit(
  loanAmountUsd: BigNumber.Value,
  grossOutputUsd: BigNumber.Value,
  bridgeFeeUsd: BigNumber.Value,
  gasFeeUsd: BigNumber.Value,
  flashFeeRate: BigNumber.Value = 0,
): ProfitBreakdown {
  const loan = nonNegative('loanAmountUsd', loanAmountUsd);
  const gross = nonNegative('grossOutputUsd', grossOutputUsd);
  const bridgeFee = nonNegative('bridgeFeeUsd', bridgeFeeUsd);
  const gasFee = nonNegative('gasFeeUsd', gasFeeUsd);
  const rate = nonNegative('flashFeeRate', flashFeeRate);

  const flashFeeCost = loan.times(rate);
  const totalFees = bridgeFee.plus(gasFee).plus(flashFeeCost);
  const grossSpread = gross.minus(loan);
  const netProfit = grossSpread.minus(totalFees);
  return {
    netProfit,
    grossSpread,
    flashFeeCost,
    totalFees,
    isProfitable: netProfit.gt(0),
  };
}

/** Convenience holder for the flash-loan fee configured at start-up. */
export class ProfitEngine {
  constructor(private readonly flashFeeRate: BigNumber.Value = 0) {}

  evaluate(
    loanAmountUsd: BigNumber.Value,
    grossOutputUsd: BigNumber.Value,
    bridgeFeeUsd: BigNumber.Value,
    gasFeeUsd: BigNumber.Value,
  ): ProfitBreakdown {
    return computeNetProfit(loanAmountUsd, grossOutputUsd, bridgeFeeUsd, gasFeeUsd, this.flashFeeRate);
  }
}

/** Whole-token amount expressed in base units. */
export function toRawAmount(wholeTokens: BigNumber.Value, decimals: number): bigint {
  return BigInt(new BigNumber(wholeTokens).shiftedBy(decimals).integerValue(BigNumber.ROUND_FLOOR).toFixed(0));
}

export function fromRawAmount(raw: bigint, decimals: number): BigNumber {
  return new BigNumber(raw.toString()).shiftedBy(-decimals);
}
