import { derivePaymentStatus, hasCentPrecision, roundCurrency } from '../../src/services/financial/payment-status';

describe('payment status', () => {
  it('should be not_paid with nothing received', () => {
    expect(derivePaymentStatus(1000, 0)).toBe('not_paid');
  });

  it('should be partially_paid below the invoice amount', () => {
    expect(derivePaymentStatus(1000, 600)).toBe('partially_paid');
  });

  it('should be fully_paid at the invoice amount', () => {
    expect(derivePaymentStatus(1000, 1000)).toBe('fully_paid');
  });

  it('should compare at cent precision', () => {
    expect(derivePaymentStatus(0.3, 0.1 + 0.2)).toBe('fully_paid');
  });

  it('should round to cents', () => {
    expect(roundCurrency(0.1 + 0.2)).toBe(0.3);
    expect(roundCurrency(1.005)).toBe(1.01);
    expect(roundCurrency(199.999)).toBe(200);
  });

  it('should recognise whole-cent amounts without rounding them', () => {
    expect(hasCentPrecision(1000)).toBe(true);
    expect(hasCentPrecision(1000.1)).toBe(true);
    expect(hasCentPrecision(0.29)).toBe(true);
    expect(hasCentPrecision(0.004)).toBe(false);
    expect(hasCentPrecision(999.999)).toBe(false);
    expect(hasCentPrecision(Number.NaN)).toBe(false);
  });
});
