import { UnauthorizedException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { SessionGuard, SESSION_COOKIE } from './session.guard';
import type { WebSessionRepository } from '@/infrastructure/persistence/web-session.repository';
import { UserStore } from '@/infrastructure/persistence/in-memory/user-store';
import type { AuthenticatedUser } from '@/domain/types/user.types';

describe('SessionGuard', () => {
  let guard: SessionGuard;
  let userStore: UserStore;
  let mockWebSessionRepository: jest.Mocked<WebSessionRepository>;

  interface FakeRequest {
    cookies?: Record<string, string>;
    user?: AuthenticatedUser;
  }

  const contextFor = (request: FakeRequest) => new ExecutionContextHost([request, {}]);

  beforeEach(() => {
    userStore = new UserStore();
    mockWebSessionRepository = {
      validateSession: jest.fn(),
      refreshSession: jest.fn().mockResolvedValue(undefined),
      deleteSession: jest.fn(),
    };
    guard = new SessionGuard(mockWebSessionRepository, userStore);
  });

  it('should attach the session user and extend the session', async () => {
    const agent = await userStore.create({
      username: 'agent',
      email: 'agent@example.com',
      fullName: null,
      role: 'AGENT',
      createdBy: null,
    });
    mockWebSessionRepository.validateSession.mockResolvedValue({ valid: true, userId: agent.id });
    const request: FakeRequest = { cookies: { [SESSION_COOKIE]: 'test-session-token' } };

    await expect(guard.canActivate(contextFor(request))).resolves.toBe(true);

    expect(request.user).toEqual({ userId: agent.id, role: 'AGENT' });
    expect(mockWebSessionRepository.validateSession).toHaveBeenCalledWith('test-session-token');
    expect(mockWebSessionRepository.refreshSession).toHaveBeenCalledWith('test-session-token');
  });

  it('should reject requests without a session cookie', async () => {
    await expect(guard.canActivate(contextFor({ cookies: {} }))).rejects.toThrow(UnauthorizedException);
    await expect(guard.canActivate(contextFor({}))).rejects.toThrow(UnauthorizedException);
    expect(mockWebSessionRepository.validateSession).not.toHaveBeenCalled();
  });

  it('should reject invalid or expired sessions', async () => {
    mockWebSessionRepository.validateSession.mockResolvedValue({ valid: false });

    await expect(
      guard.canActivate(contextFor({ cookies: { [SESSION_COOKIE]: 'test-expired-token' } })),
    ).rejects.toThrow(UnauthorizedException);
    expect(mockWebSessionRepository.refreshSession).not.toHaveBeenCalled();
  });

  it('should reject sessions of deactivated users', async () => {
    const agent = await userStore.create({
      username: 'agent',
      email: 'agent@example.com',
      fullName: null,
      role: 'AGENT',
      createdBy: null,
    });
    await userStore.update(agent.id, { isActive: false });
    mockWebSessionRepository.validateSession.mockResolvedValue({ valid: true, userId: agent.id });

    await expect(
      guard.canActivate(contextFor({ cookies: { [SESSION_COOKIE]: 'test-session-token' } })),
    ).rejects.toThrow(UnauthorizedException);
  });

  it('should reject sessions pointing at unknown users', async () => {
    mockWebSessionRepository.validateSession.mockResolvedValue({ valid: true, userId: 999 });

    await expect(
      guard.canActivate(contextFor({ cookies: { [SESSION_COOKIE]: 'test-session-token' } })),
    ).rejects.toThrow(UnauthorizedException);
  });
});
