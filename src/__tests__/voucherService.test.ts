import { describe, it, expect } from 'vitest';
import { InMemoryCommerceStore } from '../commerce/InMemoryCommerceStore.js';
import { generateVoucherCode, VoucherService } from '../commerce/VoucherService.js';
import { makeVoucher } from './helpers/fixtures.js';

describe('generateVoucherCode', () => {
  it('produces VOUCHER- followed by 16 upper-case hex characters', () => {
    expect(generateVoucherCode()).toMatch(/^VOUCHER-[0-9A-F]{16}$/);
  });
});

describe('VoucherService', () => {
  it('issues a new voucher worth the configured amount', async () => {
    const service = new VoucherService(new InMemoryCommerceStore(), {
      amountCents: 200000,
      codeGenerator: () => 'VOUCHER-AAAA',
    });

    const { voucher, created } = await service.issue('session_a');

    expect(created).toBe(true);
    expect(voucher).toMatchObject({
      code: 'VOUCHER-AAAA',
      amountCents: 200000,
      isUsed: false,
      generatedBySession: 'session_a',
    });
  });

  it('returns the unused voucher a session already holds', async () => {
    const store = new InMemoryCommerceStore({
      vouchers: [makeVoucher({ code: 'VOUCHER-HELD', generatedBySession: 'session_a' })],
    });
    const service = new VoucherService(store, { amountCents: 200000 });

    const { voucher, created } = await service.issue('session_a');

    expect(created).toBe(false);
    expect(voucher.code).toBe('VOUCHER-HELD');
  });

  it('retries with a fresh code after a collision', async () => {
    const store = new InMemoryCommerceStore({
      vouchers: [makeVoucher({ code: 'VOUCHER-TAKEN', generatedBySession: 'session_other', isUsed: true })],
    });
    const codes = ['VOUCHER-TAKEN', 'VOUCHER-FRESH'];
    const service = new VoucherService(store, {
      amountCents: 200000,
      codeGenerator: () => codes.shift() ?? 'VOUCHER-LAST',
    });

    const { voucher } = await service.issue('session_a');

    expect(voucher.code).toBe('VOUCHER-FRESH');
  });

  it('gives up after repeated collisions', async () => {
    const store = new InMemoryCommerceStore({
      vouchers: [makeVoucher({ code: 'VOUCHER-TAKEN', generatedBySession: 'session_other' })],
    });
    const service = new VoucherService(store, { amountCents: 200000, codeGenerator: () => 'VOUCHER-TAKEN' });

    await expect(service.issue('session_a')).rejects.toMatchObject({ code: 'INTERNAL_ERROR' });
  });
});
