import { Controller, Get, Req, UseGuards } from '@nestjs/common';
import { DashboardService, type DashboardStats } from '@/infrastructure/dashboard/dashboard.service';
import { SessionGuard } from '@/infrastructure/http/guards/session.guard';
import { ActionGuard } from '@/infrastructure/http/guards/action.guard';
import { RequireAction } from '@/infrastructure/http/decorators/require-action.decorator';
import type { AuthenticatedRequest } from './http.types';
import type { ApiResponse } from './api-response';

@Controller('api/dashboard')
@UseGuards(SessionGuard, ActionGuard)
export class DashboardController {
  constructor(private readonly dashboardService: DashboardService) {}

  /**
   * GET /api/dashboard/stats - Admin overview, or the caller's own plan usage for agents
   */
  @Get('stats')
  @RequireAction('dashboard:read')
  async getStats(@Req() req: AuthenticatedRequest): Promise<ApiResponse<DashboardStats>> {
    const stats = await this.dashboardService.getStats(req.user);
    return { success: true, data: stats };
  }
}
