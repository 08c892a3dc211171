import { Controller, Post, Req, Res, HttpCode, HttpStatus, UseGuards } from '@nestjs/common';
import type { Response } from 'express';
import { WebSessionRepository } from '@/infrastructure/persistence/web-session.repository';
import { SessionGuard, SESSION_COOKIE } from '@/infrastructure/http/guards/session.guard';
import type { AuthenticatedRequest } from './http.types';
import type { ApiResponse } from './api-response';

@Controller('api/session')
export class SessionController {
  constructor(private readonly webSessionRepository: WebSessionRepository) {}

  /**
   * POST /api/session/logout - End the current session and clear its cookie
   */
  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @UseGuards(SessionGuard)
  async logout(
    @Req() req: AuthenticatedRequest,
    @Res({ passthrough: true }) res: Response,
  ): Promise<ApiResponse> {
    const cookies: Record<string, unknown> = req.cookies ?? {};
    const token = cookies[SESSION_COOKIE];
    if (typeof token === 'string') {
      await this.webSessionRepository.deleteSession(token);
    }

    res.clearCookie(SESSION_COOKIE);
    return { success: true };
  }
}
