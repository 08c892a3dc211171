import {
  Controller,
  Get,
  Post,
  Patch,
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
import {
  CouponService,
  CouponError,
  InvalidCouponDefinitionError,
  type CouponErrorCode,
  type CouponView,
} from '@/infrastructure/coupons/coupon.service';
import {
  ApplyCouponSchema,
  CouponListQuerySchema,
  CreateCouponSchema,
  GenerateCodeSchema,
  UpdateCouponSchema,
  type CouponApplicationResult,
  type CouponQuote,
  type CouponRejectionCode,
} from '@/domain/types/coupon.types';
import type { Page } from '@/domain/types/plan.types';
import { SessionGuard } from '@/infrastructure/http/guards/session.guard';
import { ActionGuard } from '@/infrastructure/http/guards/action.guard';
import { RequireAction } from '@/infrastructure/http/decorators/require-action.decorator';
import type { AuthenticatedRequest } from './http.types';
import { sendInternalError, sendInvalidRequest, type ApiResponse } from './api-response';

const COUPON_ERROR_STATUS: Record<CouponErrorCode, HttpStatus> = {
  coupon_not_found: HttpStatus.NOT_FOUND,
  coupon_code_taken: HttpStatus.CONFLICT,
  invalid_coupon_definition: HttpStatus.BAD_REQUEST,
  coupon_code_generation_failed: HttpStatus.SERVICE_UNAVAILABLE,
};

/**
 * Coupon administration, validation and redemption.
 * Business-rule rejections answer 422 with the rejection code.
 */
@Controller('api/coupons')
@UseGuards(SessionGuard, ActionGuard)
export class CouponController {
  private readonly logger = new Logger(CouponController.name);

  constructor(private readonly couponService: CouponService) {}

  /**
   * GET /api/coupons - Paginated list with derived status
   */
  @Get()
  @RequireAction('coupon:manage')
  async list(@Query() query: unknown, @Res() res: Response): Promise<void> {
    const parsed = CouponListQuerySchema.safeParse(query);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    const page = await this.couponService.list(parsed.data);
    res.status(HttpStatus.OK).json({ success: true, data: page } satisfies ApiResponse<Page<CouponView>>);
  }

  /**
   * POST /api/coupons/generate-code - Suggest an unused code
   */
  @Post('generate-code')
  @RequireAction('coupon:manage')
  async generateCode(@Req() req: AuthenticatedRequest, @Res() res: Response): Promise<void> {
    const parsed = GenerateCodeSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    try {
      const code = await this.couponService.generateCode(parsed.data.length);
      res.status(HttpStatus.OK).json({ success: true, data: { code } } satisfies ApiResponse<{ code: string }>);
    } catch (error) {
      this.sendError(res, error, 'Error generating coupon code');
    }
  }

  /**
   * POST /api/coupons/validate - Price a coupon without consuming it
   */
  @Post('validate')
  @RequireAction('coupon:validate')
  async validate(@Req() req: AuthenticatedRequest, @Res() res: Response): Promise<void> {
    const parsed = ApplyCouponSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    const { code, planId, amountInCents } = parsed.data;
    const result = await this.couponService.validate(code, planId, amountInCents);
    this.sendApplication(res, result);
  }

  /**
   * POST /api/coupons/redeem - Consume one use of a coupon
   */
  @Post('redeem')
  @RequireAction('coupon:redeem')
  async redeem(@Req() req: AuthenticatedRequest, @Res() res: Response): Promise<void> {
    const parsed = ApplyCouponSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    const { code, planId, amountInCents } = parsed.data;
    const result = await this.couponService.redeem(code, planId, amountInCents, new Date(), req.user.userId);
    this.sendApplication(res, result);
  }

  /**
   * GET /api/coupons/:id
   */
  @Get(':id')
  @RequireAction('coupon:manage')
  async getById(@Param('id', ParseIntPipe) id: number, @Res() res: Response): Promise<void> {
    try {
      const coupon = await this.couponService.getById(id);
      res.status(HttpStatus.OK).json({ success: true, data: coupon } satisfies ApiResponse<CouponView>);
    } catch (error) {
      this.sendError(res, error, 'Error loading coupon');
    }
  }

  /**
   * POST /api/coupons - Create a coupon; the code is generated when omitted
   */
  @Post()
  @RequireAction('coupon:manage')
  async create(@Req() req: AuthenticatedRequest, @Res() res: Response): Promise<void> {
    const parsed = CreateCouponSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    try {
      const coupon = await this.couponService.create(parsed.data, req.user.userId);
      res.status(HttpStatus.CREATED).json({ success: true, data: coupon } satisfies ApiResponse<CouponView>);
    } catch (error) {
      this.sendError(res, error, 'Error creating coupon');
    }
  }

  /**
   * PATCH /api/coupons/:id - Partial edit; code and usage are fixed
   */
  @Patch(':id')
  @RequireAction('coupon:manage')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Req() req: AuthenticatedRequest,
    @Res() res: Response,
  ): Promise<void> {
    const parsed = UpdateCouponSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    try {
      const coupon = await this.couponService.update(id, parsed.data, req.user.userId);
      res.status(HttpStatus.OK).json({ success: true, data: coupon } satisfies ApiResponse<CouponView>);
    } catch (error) {
      this.sendError(res, error, 'Error updating coupon');
    }
  }

  /**
   * POST /api/coupons/:id/toggle-status
   */
  @Post(':id/toggle-status')
  @RequireAction('coupon:manage')
  async toggleStatus(
    @Param('id', ParseIntPipe) id: number,
    @Req() req: AuthenticatedRequest,
    @Res() res: Response,
  ): Promise<void> {
    try {
      const coupon = await this.couponService.toggleActive(id, req.user.userId);
      res.status(HttpStatus.OK).json({ success: true, data: coupon } satisfies ApiResponse<CouponView>);
    } catch (error) {
      this.sendError(res, error, 'Error toggling coupon');
    }
  }

  private sendApplication(res: Response, result: CouponApplicationResult): void {
    if (result.success) {
      res.status(HttpStatus.OK).json({ success: true, data: result.quote } satisfies ApiResponse<CouponQuote>);
      return;
    }

    res.status(HttpStatus.UNPROCESSABLE_ENTITY).json({
      success: false,
      error: result.error.message,
      code: result.error.code,
    } satisfies ApiResponse & { code: CouponRejectionCode });
  }

  private sendError(res: Response, error: unknown, context: string): void {
    if (error instanceof CouponError) {
      res.status(COUPON_ERROR_STATUS[error.code]).json({
        success: false,
        error: error.message,
        code: error.code,
        issues: error instanceof InvalidCouponDefinitionError ? error.issues : undefined,
      } satisfies ApiResponse);
      return;
    }

    this.logger.error(context, { error });
    sendInternalError(res);
  }
}
