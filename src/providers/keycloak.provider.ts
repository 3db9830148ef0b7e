import {
  IdentityProvider,
  IdentityProviderError,
  CreateExternalUserInput,
  CreateOrganizationInput,
  ExternalOrganization,
  ExternalUser,
  RegistrationEvent,
  RequestOptions,
  RequiredAction,
  TimeWindow,
} from './base.provider.js';
import { withCircuitBreaker } from '../utils/circuit-breaker.js';
import { recordProviderRequest } from '../config/metrics.js';
import { logger } from '../utils/logger.js';

export interface KeycloakProviderOptions {
  baseUrl: string;
  realm: string;
  clientId: string;
  clientSecret: string;
  requestTimeoutMs: number;
  /** Upper bound on events fetched per reconciliation window */
  maxEvents?: number;
  fetch?: typeof fetch;
}

type NotFoundPolicy = 'throw' | 'ignore';

interface AdminRequest {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  body?: unknown;
  notFound?: NotFoundPolicy;
  signal?: AbortSignal;
}

// Renew the service token this long before the provider says it expires
const TOKEN_EXPIRY_MARGIN_MS = 30000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toExternalUser(value: unknown): ExternalUser | null {
  if (!isRecord(value)) return null;
  const id = stringField(value, 'id');
  if (!id) return null;

  return {
    id,
    username: stringField(value, 'username') ?? '',
    email: stringField(value, 'email') ?? '',
    firstName: stringField(value, 'firstName') ?? '',
    lastName: stringField(value, 'lastName') ?? '',
    enabled: value['enabled'] !== false,
  };
}

function toExternalOrganization(value: unknown): ExternalOrganization | null {
  if (!isRecord(value)) return null;
  const id = stringField(value, 'id');
  if (!id) return null;

  const rawDomains = Array.isArray(value['domains']) ? value['domains'] : [];
  const domains = rawDomains
    .map((domain: unknown) => (isRecord(domain) ? stringField(domain, 'name') : undefined))
    .filter((domain): domain is string => domain !== undefined);

  return { id, name: stringField(value, 'name') ?? '', domains };
}

function toRegistrationEvent(value: unknown): RegistrationEvent | null {
  if (!isRecord(value)) return null;
  const details = isRecord(value['details']) ? value['details'] : {};
  const time = typeof value['time'] === 'number' ? value['time'] : Date.now();

  return {
    externalUserId: stringField(value, 'userId'),
    externalOrgId: stringField(details, 'organization_id') ?? stringField(details, 'org_id'),
    email: stringField(details, 'email'),
    firstName: stringField(details, 'first_name'),
    lastName: stringField(details, 'last_name'),
    timestamp: new Date(time),
  };
}

/**
 * Identity provider client for the Keycloak admin REST API, authenticated with
 * a client-credentials service account.
 */
export class KeycloakProvider extends IdentityProvider {
  readonly name = 'keycloak';

  private token: { value: string; expiresAt: number } | null = null;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: KeycloakProviderOptions) {
    super();
    this.fetchFn = options.fetch ?? fetch;
  }

  async createUser(input: CreateExternalUserInput, options: RequestOptions = {}): Promise<ExternalUser> {
    const response = await this.request('create_user', 'users', {
      method: 'POST',
      signal: options.signal,
      body: {
        username: input.username,
        email: input.email,
        firstName: input.firstName,
        lastName: input.lastName,
        enabled: true,
        emailVerified: false,
        requiredActions: input.requiredActions ?? [],
        credentials: input.password
          ? [{ type: 'password', value: input.password, temporary: false }]
          : undefined,
      },
    });

    // Location: {base}/admin/realms/{realm}/users/{id}
    const location = response?.headers.get('location');
    const id = location?.split('/').pop();
    if (id) {
      return {
        id,
        username: input.username,
        email: input.email,
        firstName: input.firstName,
        lastName: input.lastName,
        enabled: true,
      };
    }

    const created = await this.findUserByEmail(input.email, options);
    if (!created) {
      throw new IdentityProviderError(
        `User ${input.email} was not found after creation`,
        'create_user',
        this.name
      );
    }
    return created;
  }

  async findUserByEmail(email: string, options: RequestOptions = {}): Promise<ExternalUser | null> {
    const params = new URLSearchParams({ email, exact: 'true' });
    const body = await this.requestJson('find_user_by_email', `users?${params.toString()}`, options);
    if (!Array.isArray(body)) return null;

    for (const candidate of body) {
      const user = toExternalUser(candidate);
      if (user) return user;
    }
    return null;
  }

  async getUserById(id: string, options: RequestOptions = {}): Promise<ExternalUser | null> {
    const response = await this.request('get_user', `users/${encodeURIComponent(id)}`, {
      method: 'GET',
      notFound: 'ignore',
      signal: options.signal,
    });
    if (!response) return null;
    return toExternalUser(await response.json());
  }

  async deleteUser(id: string, options: RequestOptions = {}): Promise<void> {
    await this.request('delete_user', `users/${encodeURIComponent(id)}`, {
      method: 'DELETE',
      notFound: 'ignore',
      signal: options.signal,
    });
  }

  async sendRequiredActionsEmail(
    userId: string,
    actions: RequiredAction[],
    options: RequestOptions = {}
  ): Promise<void> {
    await this.request('execute_actions_email', `users/${encodeURIComponent(userId)}/execute-actions-email`, {
      method: 'PUT',
      body: actions,
      signal: options.signal,
    });
  }

  async createOrganization(input: CreateOrganizationInput, options: RequestOptions = {}): Promise<ExternalOrganization> {
    const response = await this.request('create_organization', 'organizations', {
      method: 'POST',
      signal: options.signal,
      body: {
        name: input.name,
        enabled: true,
        domains: [{ name: input.domain, verified: false }],
      },
    });

    const id = response?.headers.get('location')?.split('/').pop();
    if (id) {
      return { id, name: input.name, domains: [input.domain] };
    }
    return this.findOrganizationByDomain(input.domain, options);
  }

  async findOrganizationByDomain(domain: string, options: RequestOptions = {}): Promise<ExternalOrganization> {
    const params = new URLSearchParams({ search: domain });
    const body = await this.requestJson(
      'find_organization_by_domain',
      `organizations?${params.toString()}`,
      options
    );

    const organizations = Array.isArray(body) ? body : [];
    for (const candidate of organizations) {
      const organization = toExternalOrganization(candidate);
      if (organization && organization.domains.includes(domain)) {
        return organization;
      }
    }

    throw new IdentityProviderError(
      `Organization with domain ${domain} not found`,
      'find_organization_by_domain',
      this.name,
      404
    );
  }

  async addUserToOrganization(userId: string, orgId: string, options: RequestOptions = {}): Promise<void> {
    await this.request('add_organization_member', `organizations/${encodeURIComponent(orgId)}/members`, {
      method: 'POST',
      body: userId,
      signal: options.signal,
    });
  }

  async removeUserFromOrganization(userId: string, orgId: string, options: RequestOptions = {}): Promise<void> {
    await this.request(
      'remove_organization_member',
      `organizations/${encodeURIComponent(orgId)}/members/${encodeURIComponent(userId)}`,
      { method: 'DELETE', notFound: 'ignore', signal: options.signal }
    );
  }

  async deleteOrganization(id: string, options: RequestOptions = {}): Promise<void> {
    await this.request('delete_organization', `organizations/${encodeURIComponent(id)}`, {
      method: 'DELETE',
      notFound: 'ignore',
      signal: options.signal,
    });
  }

  async listRecentRegistrationEvents(window: TimeWindow, options: RequestOptions = {}): Promise<RegistrationEvent[]> {
    const params = new URLSearchParams({
      type: 'REGISTER',
      dateFrom: String(window.from.getTime()),
      dateTo: String(window.to.getTime()),
      first: '0',
      max: String(this.options.maxEvents ?? 1000),
    });

    const body = await this.requestJson('list_registration_events', `events?${params.toString()}`, options);
    if (!Array.isArray(body)) return [];

    return body
      .map((event: unknown) => toRegistrationEvent(event))
      .filter((event): event is RegistrationEvent => event !== null);
  }

  private async requestJson(operation: string, path: string, options: RequestOptions): Promise<unknown> {
    const response = await this.request(operation, path, { method: 'GET', signal: options.signal });
    return response ? response.json() : null;
  }

  /**
   * Sends an admin API request behind the provider's circuit breaker.
   * Resolves to null when the resource is absent and `notFound` is 'ignore'.
   */
  private async request(operation: string, path: string, init: AdminRequest): Promise<Response | null> {
    const startTime = process.hrtime.bigint();
    let status = 'error';

    try {
      const response = await withCircuitBreaker(
        `identity-provider:${this.name}`,
        () => this.send(operation, path, init),
        {
          timeout: this.options.requestTimeoutMs,
          // Rejections such as 404/409 are answers, not an unhealthy provider
          errorFilter: (error) => error instanceof IdentityProviderError && error.isClientError,
        }
      );
      status = response ? String(response.status) : '404';
      return response;
    } finally {
      const duration = Number(process.hrtime.bigint() - startTime) / 1e9;
      recordProviderRequest(this.name, operation, status, duration);
    }
  }

  private async send(operation: string, path: string, init: AdminRequest): Promise<Response | null> {
    const token = await this.getAccessToken(init.signal);
    const url = `${this.options.baseUrl}/admin/realms/${encodeURIComponent(this.options.realm)}/${path}`;

    const response = await this.fetchFn(url, {
      method: init.method,
      headers: {
        Authorization: `Bearer ${token}`,
        ...(init.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
      },
      body: init.body !== undefined ? JSON.stringify(init.body) : undefined,
      signal: this.withTimeout(init.signal),
    });

    if (response.status === 404 && init.notFound === 'ignore') {
      logger.debug({ operation, path }, 'Identity provider resource already absent');
      return null;
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new IdentityProviderError(
        `Identity provider ${operation} failed with status ${response.status}`,
        operation,
        this.name,
        response.status,
        detail
      );
    }

    return response;
  }

  private async getAccessToken(signal?: AbortSignal): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now()) {
      return this.token.value;
    }

    const url = `${this.options.baseUrl}/realms/${encodeURIComponent(this.options.realm)}/protocol/openid-connect/token`;
    const response = await this.fetchFn(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'client_credentials',
        client_id: this.options.clientId,
        client_secret: this.options.clientSecret,
      }).toString(),
      signal: this.withTimeout(signal),
    });

    if (!response.ok) {
      throw new IdentityProviderError(
        `Service account authentication failed with status ${response.status}`,
        'authenticate',
        this.name,
        response.status
      );
    }

    const body: unknown = await response.json();
    const accessToken = isRecord(body) ? stringField(body, 'access_token') : undefined;
    if (!isRecord(body) || !accessToken) {
      throw new IdentityProviderError('Token response did not contain an access token', 'authenticate', this.name);
    }

    const expiresInSeconds = typeof body['expires_in'] === 'number' ? body['expires_in'] : 60;
    this.token = {
      value: accessToken,
      expiresAt: Date.now() + expiresInSeconds * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
    return accessToken;
  }

  private withTimeout(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.options.requestTimeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }
}
