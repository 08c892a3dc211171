import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * Typed access to environment configuration.
 * Required variables are checked once, at construction.
 */
@Injectable()
export class AppConfigService {
  constructor(private readonly configService: ConfigService) {
    this.validateRequiredConfig();
  }

  private validateRequiredConfig(): void {
    const requiredVars = ['DATABASE_URL'];

    for (const varName of requiredVars) {
      const value = this.configService.get<string>(varName);
      if (!value) {
        throw new Error(`${varName} is not set`);
      }
    }
  }

  private getPositiveInt(name: string, fallback: string): number {
    const value = Number.parseInt(this.configService.get<string>(name, fallback), 10);
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`${name} must be a positive integer`);
    }
    return value;
  }

  getDatabaseUrl(): string {
    const value = this.configService.get<string>('DATABASE_URL');
    if (!value) {
      throw new Error('DATABASE_URL is not set');
    }
    return value;
  }

  getPort(): number {
    return this.getPositiveInt('PORT', '3000');
  }

  getItemsPerPage(): number {
    return this.getPositiveInt('ITEMS_PER_PAGE', '10');
  }

  getCouponCodeLength(): number {
    return this.getPositiveInt('COUPON_CODE_LENGTH', '8');
  }

  getCouponCodeMaxAttempts(): number {
    return this.getPositiveInt('COUPON_CODE_MAX_ATTEMPTS', '10');
  }

  getSessionTtlDays(): number {
    return this.getPositiveInt('SESSION_TTL_DAYS', '1');
  }

  shouldSeedDefaultPlans(): boolean {
    return this.configService.get<string>('SEED_DEFAULT_PLANS', 'true') !== 'false';
  }
}
