import { CreateCouponSchema, UpdateCouponSchema } from './coupon.types';

describe('CreateCouponSchema', () => {
  const body = {
    name: 'Spring sale',
    discountType: 'PERCENTAGE',
    discountValue: 10,
    validUntil: '2030-01-31T00:00:00.000Z',
  };

  it('should parse ISO strings into dates', () => {
    const parsed = CreateCouponSchema.safeParse({ ...body, validFrom: '2030-01-01T00:00:00.000Z' });

    expect(parsed.success).toBe(true);
    if (parsed.success) {
      expect(parsed.data.validFrom).toEqual(new Date('2030-01-01T00:00:00.000Z'));
      expect(parsed.data.validUntil).toEqual(new Date('2030-01-31T00:00:00.000Z'));
    }
  });

  it('should reject a null validFrom instead of reading it as the epoch', () => {
    const parsed = CreateCouponSchema.safeParse({ ...body, validFrom: null });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0].path).toEqual(['validFrom']);
    }
  });

  it('should reject boolean and unparseable dates', () => {
    expect(CreateCouponSchema.safeParse({ ...body, validUntil: true }).success).toBe(false);
    expect(CreateCouponSchema.safeParse({ ...body, validUntil: 'next tuesday' }).success).toBe(false);
  });
});

describe('UpdateCouponSchema', () => {
  it('should reject a null validUntil', () => {
    const parsed = UpdateCouponSchema.safeParse({ validUntil: null });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0].path).toEqual(['validUntil']);
    }
  });

  it('should leave omitted dates undefined', () => {
    const parsed = UpdateCouponSchema.safeParse({ name: 'Renamed' });

    expect(parsed.success).toBe(true);
    if (parsed.success) {
      expect(parsed.data.validUntil).toBeUndefined();
    }
  });
});
