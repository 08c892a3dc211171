import { SetMetadata } from '@nestjs/common';
import type { Action } from '@/domain/types/user.types';

export const REQUIRED_ACTION_KEY = 'requiredAction';

/**
 * Capability the caller's role must hold, checked by ActionGuard
 */
export const RequireAction = (action: Action) => SetMetadata(REQUIRED_ACTION_KEY, action);
