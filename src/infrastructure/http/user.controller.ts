import {
  Controller,
  Get,
  Post,
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
import { UserService, UserError, type UserErrorCode } from '@/infrastructure/users/user.service';
import {
  AssignPlanSchema,
  CreateUserSchema,
  UserListQuerySchema,
  type UserData,
} from '@/domain/types/user.types';
import type { Page } from '@/domain/types/plan.types';
import { SessionGuard } from '@/infrastructure/http/guards/session.guard';
import { ActionGuard } from '@/infrastructure/http/guards/action.guard';
import { RequireAction } from '@/infrastructure/http/decorators/require-action.decorator';
import type { AuthenticatedRequest } from './http.types';
import { sendInternalError, sendInvalidRequest, type ApiResponse } from './api-response';

const USER_ERROR_STATUS: Record<UserErrorCode, HttpStatus> = {
  user_not_found: HttpStatus.NOT_FOUND,
  user_exists: HttpStatus.CONFLICT,
  role_not_allowed: HttpStatus.FORBIDDEN,
  cannot_deactivate_self: HttpStatus.BAD_REQUEST,
  plan_not_assignable: HttpStatus.BAD_REQUEST,
  plan_unavailable: HttpStatus.BAD_REQUEST,
};

@Controller('api/users')
@UseGuards(SessionGuard, ActionGuard)
export class UserController {
  private readonly logger = new Logger(UserController.name);

  constructor(private readonly userService: UserService) {}

  @Get()
  @RequireAction('user:read')
  async list(@Query() query: unknown, @Res() res: Response): Promise<void> {
    const parsed = UserListQuerySchema.safeParse(query);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    const page = await this.userService.list(parsed.data);
    res.status(HttpStatus.OK).json({ success: true, data: page } satisfies ApiResponse<Page<UserData>>);
  }

  @Post()
  @RequireAction('user:manage')
  async create(@Req() req: AuthenticatedRequest, @Res() res: Response): Promise<void> {
    const parsed = CreateUserSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    try {
      const user = await this.userService.create(parsed.data, req.user);
      res.status(HttpStatus.CREATED).json({ success: true, data: user } satisfies ApiResponse<UserData>);
    } catch (error) {
      this.sendError(res, error, 'Error creating user');
    }
  }

  @Post(':id/toggle-status')
  @RequireAction('user:manage')
  async toggleStatus(
    @Param('id', ParseIntPipe) id: number,
    @Req() req: AuthenticatedRequest,
    @Res() res: Response,
  ): Promise<void> {
    try {
      const user = await this.userService.toggleActive(id, req.user);
      res.status(HttpStatus.OK).json({ success: true, data: user } satisfies ApiResponse<UserData>);
    } catch (error) {
      this.sendError(res, error, 'Error toggling user');
    }
  }

  /**
   * POST /api/users/:id/assign-plan - Start a plan period for an agent
   */
  @Post(':id/assign-plan')
  @RequireAction('user:manage')
  async assignPlan(
    @Param('id', ParseIntPipe) id: number,
    @Req() req: AuthenticatedRequest,
    @Res() res: Response,
  ): Promise<void> {
    const parsed = AssignPlanSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    try {
      const user = await this.userService.assignPlan(id, parsed.data.planId, req.user);
      res.status(HttpStatus.OK).json({ success: true, data: user } satisfies ApiResponse<UserData>);
    } catch (error) {
      this.sendError(res, error, 'Error assigning plan');
    }
  }

  private sendError(res: Response, error: unknown, context: string): void {
    if (error instanceof UserError) {
      res.status(USER_ERROR_STATUS[error.code]).json({
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
