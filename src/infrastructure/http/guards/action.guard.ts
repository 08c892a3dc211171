import { Injectable, CanActivate, ExecutionContext, ForbiddenException, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { PermissionsUtil } from '@/domain/utils/permissions.util';
import type { Action } from '@/domain/types/user.types';
import { REQUIRED_ACTION_KEY } from '../decorators/require-action.decorator';
import type { SessionRequest } from '../http.types';

/**
 * Runs after SessionGuard; routes without @RequireAction only need a session
 */
@Injectable()
export class ActionGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const action = this.reflector.getAllAndOverride<Action | undefined>(REQUIRED_ACTION_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (!action) {
      return true;
    }

    const { user } = context.switchToHttp().getRequest<SessionRequest>();
    if (!user) throw new UnauthorizedException();

    if (!PermissionsUtil.can(user.role, action)) {
      throw new ForbiddenException(`Role ${user.role} cannot perform ${action}`);
    }
    return true;
  }
}
