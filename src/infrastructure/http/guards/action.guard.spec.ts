import { ForbiddenException, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ActionGuard } from './action.guard';
import { RequireAction } from '../decorators/require-action.decorator';
import type { AuthenticatedUser } from '@/domain/types/user.types';

class FakeController {
  @RequireAction('coupon:manage')
  manage(): void {}

  open(): void {}
}

describe('ActionGuard', () => {
  const guard = new ActionGuard(new Reflector());

  const contextFor = (handler: () => void, user?: AuthenticatedUser) =>
    new ExecutionContextHost([{ user }, {}], FakeController, handler);

  it('should let handlers without a required action through', () => {
    expect(guard.canActivate(contextFor(FakeController.prototype.open))).toBe(true);
  });

  it('should allow roles holding the action', () => {
    const owner: AuthenticatedUser = { userId: 1, role: 'OWNER' };

    expect(guard.canActivate(contextFor(FakeController.prototype.manage, owner))).toBe(true);
  });

  it('should forbid roles lacking the action', () => {
    const agent: AuthenticatedUser = { userId: 2, role: 'AGENT' };

    expect(() => guard.canActivate(contextFor(FakeController.prototype.manage, agent))).toThrow(
      new ForbiddenException('Role AGENT cannot perform coupon:manage'),
    );
  });

  it('should refuse protected handlers when no session user is attached', () => {
    expect(() => guard.canActivate(contextFor(FakeController.prototype.manage))).toThrow(UnauthorizedException);
  });
});
