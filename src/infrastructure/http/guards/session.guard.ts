import { Injectable, CanActivate, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { WebSessionRepository } from '@/infrastructure/persistence/web-session.repository';
import { UserRepository } from '@/infrastructure/persistence/user.repository';
import type { SessionRequest } from '../http.types';

export const SESSION_COOKIE = 'session_token';

@Injectable()
export class SessionGuard implements CanActivate {
  constructor(
    private readonly webSessionRepository: WebSessionRepository,
    private readonly userRepository: UserRepository,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<SessionRequest>();
    const cookies: Record<string, unknown> = request.cookies ?? {};
    const token = cookies[SESSION_COOKIE];

    if (typeof token !== 'string' || !token) throw new UnauthorizedException();

    const result = await this.webSessionRepository.validateSession(token);
    if (!result.valid) throw new UnauthorizedException();

    const user = await this.userRepository.findById(result.userId);
    if (!user || !user.isActive) throw new UnauthorizedException();

    // Sliding expiration
    await this.webSessionRepository.refreshSession(token);

    request.user = { userId: user.id, role: user.role };
    return true;
  }
}
