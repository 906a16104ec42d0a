/**
 * Roles carried in the access token's `role` claim.
 */
export enum UserRole {
  SuperAdmin = 'SuperAdmin',
  Admin = 'Admin',
  ProjectManager = 'ProjectManager',
  Accountant = 'Accountant',
  SiteEngineer = 'SiteEngineer',
  SubContractor = 'SubContractor',
  Inspector = 'Inspector',
  RecordLivePayment = 'RecordLivePayment',
}

/**
 * The caller, as resolved from a verified access token.
 */
export interface AuthenticatedUser {
  id: string;
  role: UserRole;
}

export const isUserRole = (value: unknown): value is UserRole =>
  typeof value === 'string' && Object.values<string>(UserRole).includes(value);
