import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Param,
  Query,
  Req,
  Res,
  HttpStatus,
  Logger,
  ParseIntPipe,
  UseGuards,
} from '@nestjs/common';
import type { Response } from 'express';
import { PlanService, PlanError, type PlanView } from '@/infrastructure/plans/plan.service';
import {
  CreatePlanSchema,
  PageQuerySchema,
  UpdatePlanSchema,
  type Page,
} from '@/domain/types/plan.types';
import { SessionGuard } from '@/infrastructure/http/guards/session.guard';
import { ActionGuard } from '@/infrastructure/http/guards/action.guard';
import { RequireAction } from '@/infrastructure/http/decorators/require-action.decorator';
import type { AuthenticatedRequest } from './http.types';
import { sendInternalError, sendInvalidRequest, type ApiResponse } from './api-response';

const PLAN_ERROR_STATUS: Record<PlanError['code'], HttpStatus> = {
  plan_not_found: HttpStatus.NOT_FOUND,
  plan_name_taken: HttpStatus.CONFLICT,
  plan_in_use: HttpStatus.CONFLICT,
};

@Controller('api/plans')
@UseGuards(SessionGuard, ActionGuard)
export class PlanController {
  private readonly logger = new Logger(PlanController.name);

  constructor(private readonly planService: PlanService) {}

  /**
   * GET /api/plans - Every plan, newest first
   */
  @Get()
  @RequireAction('plan:read')
  async list(@Query() query: unknown, @Res() res: Response): Promise<void> {
    const parsed = PageQuerySchema.safeParse(query);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    const page = await this.planService.list(parsed.data);
    res.status(HttpStatus.OK).json({ success: true, data: page } satisfies ApiResponse<Page<PlanView>>);
  }

  /**
   * GET /api/plans/active - Plans that can be assigned, cheapest first
   */
  @Get('active')
  @RequireAction('plan:read')
  async getActive(@Res() res: Response): Promise<void> {
    const plans = await this.planService.getActivePlans();
    res.status(HttpStatus.OK).json({ success: true, data: plans } satisfies ApiResponse<PlanView[]>);
  }

  @Get(':id')
  @RequireAction('plan:read')
  async getById(@Param('id', ParseIntPipe) id: number, @Res() res: Response): Promise<void> {
    try {
      const plan = await this.planService.getById(id);
      res.status(HttpStatus.OK).json({ success: true, data: plan } satisfies ApiResponse<PlanView>);
    } catch (error) {
      this.sendError(res, error, 'Error loading plan');
    }
  }

  @Post()
  @RequireAction('plan:manage')
  async create(@Req() req: AuthenticatedRequest, @Res() res: Response): Promise<void> {
    const parsed = CreatePlanSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    try {
      const plan = await this.planService.create(parsed.data, req.user.userId);
      res.status(HttpStatus.CREATED).json({ success: true, data: plan } satisfies ApiResponse<PlanView>);
    } catch (error) {
      this.sendError(res, error, 'Error creating plan');
    }
  }

  @Patch(':id')
  @RequireAction('plan:manage')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Req() req: AuthenticatedRequest,
    @Res() res: Response,
  ): Promise<void> {
    const parsed = UpdatePlanSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    try {
      const plan = await this.planService.update(id, parsed.data, req.user.userId);
      res.status(HttpStatus.OK).json({ success: true, data: plan } satisfies ApiResponse<PlanView>);
    } catch (error) {
      this.sendError(res, error, 'Error updating plan');
    }
  }

  @Post(':id/toggle-status')
  @RequireAction('plan:manage')
  async toggleStatus(
    @Param('id', ParseIntPipe) id: number,
    @Req() req: AuthenticatedRequest,
    @Res() res: Response,
  ): Promise<void> {
    try {
      const plan = await this.planService.toggleActive(id, req.user.userId);
      res.status(HttpStatus.OK).json({ success: true, data: plan } satisfies ApiResponse<PlanView>);
    } catch (error) {
      this.sendError(res, error, 'Error toggling plan');
    }
  }

  /**
   * DELETE /api/plans/:id - Soft delete, refused while users hold the plan
   */
  @Delete(':id')
  @RequireAction('plan:manage')
  async remove(
    @Param('id', ParseIntPipe) id: number,
    @Req() req: AuthenticatedRequest,
    @Res() res: Response,
  ): Promise<void> {
    try {
      await this.planService.delete(id, req.user.userId);
      res.status(HttpStatus.OK).json({ success: true } satisfies ApiResponse);
    } catch (error) {
      this.sendError(res, error, 'Error deleting plan');
    }
  }

  private sendError(res: Response, error: unknown, context: string): void {
    if (error instanceof PlanError) {
      res.status(PLAN_ERROR_STATUS[error.code]).json({
        success: false,
        error: error.message,
        code: error.code,
      } satisfies ApiResponse);
      return;
    }

    this.logger.error(context, { error });
    sendInternalError(res);
  }
}
