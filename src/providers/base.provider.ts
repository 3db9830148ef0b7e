export interface RequestOptions {
  signal?: AbortSignal;
}

/** Actions the provider forces on a user at next login */
export type RequiredAction = 'UPDATE_PASSWORD' | 'VERIFY_EMAIL';

export interface ExternalUser {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  enabled: boolean;
}

export interface CreateExternalUserInput {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  password?: string;
  requiredActions?: RequiredAction[];
}

export interface ExternalOrganization {
  id: string;
  name: string;
  domains: string[];
}

export interface CreateOrganizationInput {
  name: string;
  domain: string;
}

export interface TimeWindow {
  from: Date;
  to: Date;
}

/**
 * A self-service registration observed in the provider. Fields the provider
 * did not report are left undefined; callers validate them.
 */
export interface RegistrationEvent {
  externalUserId?: string;
  externalOrgId?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  timestamp: Date;
}

/**
 * Capability interface over the external identity system.
 *
 * Delete and remove operations treat "not found" as success: the resource may
 * already be gone after a previous partial run.
 */
export abstract class IdentityProvider {
  abstract readonly name: string;

  abstract createUser(input: CreateExternalUserInput, options?: RequestOptions): Promise<ExternalUser>;

  abstract findUserByEmail(email: string, options?: RequestOptions): Promise<ExternalUser | null>;

  abstract getUserById(id: string, options?: RequestOptions): Promise<ExternalUser | null>;

  abstract deleteUser(id: string, options?: RequestOptions): Promise<void>;

  abstract sendRequiredActionsEmail(
    userId: string,
    actions: RequiredAction[],
    options?: RequestOptions
  ): Promise<void>;

  abstract createOrganization(input: CreateOrganizationInput, options?: RequestOptions): Promise<ExternalOrganization>;

  abstract addUserToOrganization(userId: string, orgId: string, options?: RequestOptions): Promise<void>;

  abstract removeUserFromOrganization(userId: string, orgId: string, options?: RequestOptions): Promise<void>;

  abstract deleteOrganization(id: string, options?: RequestOptions): Promise<void>;

  abstract listRecentRegistrationEvents(
    window: TimeWindow,
    options?: RequestOptions
  ): Promise<RegistrationEvent[]>;
}

export class IdentityProviderError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly provider: string,
    public readonly status?: number,
    public readonly rawResponse?: unknown
  ) {
    super(message);
    this.name = 'IdentityProviderError';
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }

  get isClientError(): boolean {
    return this.status !== undefined && this.status >= 400 && this.status < 500;
  }
}
