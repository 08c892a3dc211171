import type { UserData, UserRole } from '@/domain/types/user.types';

export type NewUserData = Pick<UserData, 'username' | 'email' | 'fullName' | 'role' | 'createdBy'>;

export type UserChanges = Partial<
  Pick<
    UserData,
    'fullName' | 'isActive' | 'planId' | 'planStartDate' | 'planExpiryDate' | 'pdfGenerated' | 'pdfLimit'
  >
>;

export interface UserListFilter {
  role?: UserRole;
}

export abstract class UserRepository {
  abstract findById(id: number): Promise<UserData | null>;

  abstract findByUsernameOrEmail(username: string, email: string): Promise<UserData | null>;

  /**
   * Users matching the filter, newest first
   */
  abstract list(filter: UserListFilter): Promise<UserData[]>;

  abstract countByRole(role: UserRole, onlyActive: boolean): Promise<number>;

  abstract countByPlanId(planId: number): Promise<number>;

  abstract create(input: NewUserData): Promise<UserData>;

  abstract update(id: number, changes: UserChanges): Promise<UserData | null>;
}
