import { Module } from '@nestjs/common';
import { CouponEligibilityService } from './services/coupon-eligibility.service';
import { DiscountCalculatorService } from './services/discount-calculator.service';

/**
 * Pure business rules, free of persistence and transport
 */
@Module({
  providers: [CouponEligibilityService, DiscountCalculatorService],
  exports: [CouponEligibilityService, DiscountCalculatorService],
})
export class DomainModule {}
