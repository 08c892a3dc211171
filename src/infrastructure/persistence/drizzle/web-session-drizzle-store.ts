import { Injectable, Inject } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import {
  WebSessionRepository,
  WebSessionValidationResult,
} from '../web-session.repository';
import { webSessions } from '@/infrastructure/database/schema';
import { DATABASE_CONNECTION, type Database } from '@/infrastructure/database/database.module';
import { withRetry } from '@/infrastructure/database/retry';
import { AppConfigService } from '@/config/app.config';

@Injectable()
export class WebSessionDrizzleStore extends WebSessionRepository {
  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: Database,
    private readonly appConfig: AppConfigService,
  ) {
    super();
  }

  private getExpiresAt(): Date {
    return new Date(Date.now() + this.appConfig.getSessionTtlDays() * 24 * 60 * 60 * 1000);
  }

  async validateSession(token: string): Promise<WebSessionValidationResult> {
    const result = await withRetry('webSessions.validate', () =>
      this.db.select().from(webSessions).where(eq(webSessions.token, token)).limit(1),
    );

    if (result.length === 0) {
      return { valid: false };
    }

    const session = result[0];

    if (session.expiresAt < new Date()) {
      return { valid: false };
    }

    return { valid: true, userId: session.userId };
  }

  async refreshSession(token: string): Promise<void> {
    const expiresAt = this.getExpiresAt();

    await withRetry('webSessions.refresh', () =>
      this.db
        .update(webSessions)
        .set({ expiresAt, updatedAt: new Date() })
        .where(eq(webSessions.token, token)),
    );
  }

  async deleteSession(token: string): Promise<void> {
    await withRetry('webSessions.delete', () =>
      this.db.delete(webSessions).where(eq(webSessions.token, token)),
    );
  }
}
