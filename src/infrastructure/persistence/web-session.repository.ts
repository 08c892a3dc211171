export type WebSessionValidationResult = { valid: true; userId: number } | { valid: false };

/**
 * Sessions are issued by the authentication service; this side only reads,
 * extends and ends them.
 */
export abstract class WebSessionRepository {
  abstract validateSession(token: string): Promise<WebSessionValidationResult>;

  abstract refreshSession(token: string): Promise<void>;

  abstract deleteSession(token: string): Promise<void>;
}
