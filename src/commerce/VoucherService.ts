import { randomBytes } from 'crypto';
import pino from 'pino';
import { AppError } from '../errors/AppError.js';
import type { ICommerceStore } from './ICommerceStore.js';
import type { Voucher } from './types.js';

const logger = pino({ name: 'VoucherService' });

const MAX_CODE_ATTEMPTS = 5;

export function generateVoucherCode(): string {
  return `VOUCHER-${randomBytes(8).toString('hex').toUpperCase()}`;
}

export interface VoucherServiceOptions {
  amountCents: number;
  codeGenerator?: () => string;
}

/**
 * Issues one spendable voucher per session. A session that already holds an
 * unused voucher gets that voucher back instead of a new one.
 */
export class VoucherService {
  private readonly amountCents: number;
  private readonly codeGenerator: () => string;

  constructor(
    private readonly store: ICommerceStore,
    options: VoucherServiceOptions
  ) {
    this.amountCents = options.amountCents;
    this.codeGenerator = options.codeGenerator ?? generateVoucherCode;
  }

  async issue(sessionId: string): Promise<{ voucher: Voucher; created: boolean }> {
    const existing = await this.store.findUnusedVoucherForSession(sessionId);
    if (existing) {
      return { voucher: existing, created: false };
    }

    for (let attempt = 1; attempt <= MAX_CODE_ATTEMPTS; attempt++) {
      try {
        const voucher = await this.store.createVoucher({
          code: this.codeGenerator(),
          amountCents: this.amountCents,
          generatedBySession: sessionId,
        });
        logger.info({ sessionId, code: voucher.code }, 'Voucher issued');
        return { voucher, created: true };
      } catch (error) {
        if (!(error instanceof AppError && error.code === 'DATABASE_UNIQUE_VIOLATION')) {
          throw error;
        }
        logger.warn({ sessionId, attempt }, 'Voucher code collision, retrying');
      }
    }

    throw AppError.internal(`Could not generate a unique voucher code after ${MAX_CODE_ATTEMPTS} attempts`);
  }
}
