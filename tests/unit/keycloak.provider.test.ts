import { describe, it, expect, vi } from 'vitest';
import { KeycloakProvider } from '../../src/providers/keycloak.provider.js';
import { IdentityProviderError } from '../../src/providers/base.provider.js';

const BASE_URL = 'http://idp.test';
const ADMIN_URL = `${BASE_URL}/admin/realms/tenants`;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function createProvider(handler: (url: string, init?: RequestInit) => Response) {
  const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
    const url = String(input);
    if (url.endsWith('/protocol/openid-connect/token')) {
      return json({ access_token: 'test-token', expires_in: 300 });
    }
    return handler(url, init);
  });

  const provider = new KeycloakProvider({
    baseUrl: BASE_URL,
    realm: 'tenants',
    clientId: 'tenant-onboarding',
    clientSecret: 'test-secret',
    requestTimeoutMs: 5000,
    fetch: fetchMock,
  });

  return { provider, fetchMock };
}

async function providerError(promise: Promise<unknown>): Promise<IdentityProviderError> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof IdentityProviderError)) {
    throw new Error(`Expected an IdentityProviderError, got ${String(error)}`);
  }
  return error;
}

function sentBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body));
}

describe('KeycloakProvider', () => {
  describe('authentication', () => {
    it('should fetch a service token once and reuse it', async () => {
      const { provider, fetchMock } = createProvider(() => json([]));

      await provider.findUserByEmail('ada@acme.test');
      await provider.findUserByEmail('bob@acme.test');

      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(String(fetchMock.mock.calls[0]?.[0])).toBe(`${BASE_URL}/realms/tenants/protocol/openid-connect/token`);
      expect(String(fetchMock.mock.calls[0]?.[1]?.body)).toBe(
        'grant_type=client_credentials&client_id=tenant-onboarding&client_secret=test-secret'
      );
      expect(fetchMock.mock.calls[2]?.[1]).toMatchObject({
        method: 'GET',
        headers: { Authorization: 'Bearer test-token' },
      });
    });

    it('should fail with an authenticate error when the token is refused', async () => {
      const fetchMock = vi.fn<typeof fetch>(async () => json({ error: 'unauthorized_client' }, 401));
      const provider = new KeycloakProvider({
        baseUrl: BASE_URL,
        realm: 'tenants',
        clientId: 'tenant-onboarding',
        clientSecret: 'wrong-secret',
        requestTimeoutMs: 5000,
        fetch: fetchMock,
      });

      const error = await providerError(provider.findUserByEmail('ada@acme.test'));

      expect(error.operation).toBe('authenticate');
      expect(error.status).toBe(401);
    });
  });

  describe('users', () => {
    it('should find a user by exact email', async () => {
      const { provider, fetchMock } = createProvider(() =>
        json([{ id: 'u-1', username: 'ada', email: 'ada@acme.test', firstName: 'Ada', lastName: 'Lovelace' }])
      );

      const user = await provider.findUserByEmail('ada@acme.test');

      expect(String(fetchMock.mock.calls[1]?.[0])).toBe(`${ADMIN_URL}/users?email=ada%40acme.test&exact=true`);
      expect(user).toEqual({
        id: 'u-1',
        username: 'ada',
        email: 'ada@acme.test',
        firstName: 'Ada',
        lastName: 'Lovelace',
        enabled: true,
      });
    });

    it('should return null when no user has the email', async () => {
      const { provider } = createProvider(() => json([]));

      await expect(provider.findUserByEmail('nobody@acme.test')).resolves.toBeNull();
    });

    it('should take the new user id from the location header', async () => {
      const { provider, fetchMock } = createProvider(
        () => new Response(null, { status: 201, headers: { Location: `${ADMIN_URL}/users/u-42` } })
      );

      const user = await provider.createUser({
        username: 'ada',
        email: 'ada@acme.test',
        firstName: 'Ada',
        lastName: 'Lovelace',
        password: 'test-password',
      });

      expect(user.id).toBe('u-42');
      expect(sentBody(fetchMock.mock.calls[1]?.[1])).toEqual({
        username: 'ada',
        email: 'ada@acme.test',
        firstName: 'Ada',
        lastName: 'Lovelace',
        enabled: true,
        emailVerified: false,
        requiredActions: [],
        credentials: [{ type: 'password', value: 'test-password', temporary: false }],
      });
    });

    it('should surface a conflict as a client error', async () => {
      const { provider } = createProvider(() => json({ errorMessage: 'User exists with same email' }, 409));

      const error = await providerError(
        provider.createUser({ username: 'ada', email: 'ada@acme.test', firstName: 'Ada', lastName: 'Lovelace' })
      );

      expect(error.status).toBe(409);
      expect(error.operation).toBe('create_user');
      expect(error.isClientError).toBe(true);
    });

    it('should treat deleting a missing user as success', async () => {
      const { provider, fetchMock } = createProvider(() => new Response(null, { status: 404 }));

      await expect(provider.deleteUser('u-gone')).resolves.toBeUndefined();
      expect(fetchMock.mock.calls[1]?.[1]?.method).toBe('DELETE');
    });

    it('should return null for an unknown user id', async () => {
      const { provider } = createProvider(() => new Response(null, { status: 404 }));

      await expect(provider.getUserById('u-gone')).resolves.toBeNull();
    });

    it('should fail deletion on a server error', async () => {
      const { provider } = createProvider(() => new Response('upstream failure', { status: 500 }));

      const error = await providerError(provider.deleteUser('u-1'));

      expect(error.status).toBe(500);
      expect(error.isClientError).toBe(false);
      expect(error.message).toBe('Identity provider delete_user failed with status 500');
      expect(error.rawResponse).toBe('upstream failure');
    });

    it('should send required actions by email', async () => {
      const { provider, fetchMock } = createProvider(() => new Response(null, { status: 204 }));

      await provider.sendRequiredActionsEmail('u-1', ['UPDATE_PASSWORD', 'VERIFY_EMAIL']);

      expect(String(fetchMock.mock.calls[1]?.[0])).toBe(`${ADMIN_URL}/users/u-1/execute-actions-email`);
      expect(fetchMock.mock.calls[1]?.[1]?.method).toBe('PUT');
      expect(sentBody(fetchMock.mock.calls[1]?.[1])).toEqual(['UPDATE_PASSWORD', 'VERIFY_EMAIL']);
    });
  });

  describe('organizations', () => {
    it('should find the organization that owns the exact domain', async () => {
      const { provider } = createProvider(() =>
        json([
          { id: 'o-1', name: 'Acme Labs', domains: [{ name: 'labs.acme.test' }] },
          { id: 'o-2', name: 'Acme', domains: [{ name: 'acme.test' }] },
        ])
      );

      await expect(provider.findOrganizationByDomain('acme.test')).resolves.toEqual({
        id: 'o-2',
        name: 'Acme',
        domains: ['acme.test'],
      });
    });

    it('should reject with not found when no organization owns the domain', async () => {
      const { provider } = createProvider(() => json([]));

      const error = await providerError(provider.findOrganizationByDomain('acme.test'));

      expect(error.isNotFound).toBe(true);
    });

    it('should create an organization with its domain', async () => {
      const { provider, fetchMock } = createProvider(
        () => new Response(null, { status: 201, headers: { Location: `${ADMIN_URL}/organizations/o-7` } })
      );

      const organization = await provider.createOrganization({ name: 'Acme', domain: 'acme.test' });

      expect(organization).toEqual({ id: 'o-7', name: 'Acme', domains: ['acme.test'] });
      expect(fetchMock).toHaveBeenCalledTimes(2);

      expect(String(fetchMock.mock.calls[1]?.[0])).toBe(`${ADMIN_URL}/organizations`);
      expect(sentBody(fetchMock.mock.calls[1]?.[1])).toEqual({
        name: 'Acme',
        enabled: true,
        domains: [{ name: 'acme.test', verified: false }],
      });
    });

    it('should look the organization up by domain when no location is returned', async () => {
      const { provider } = createProvider((_url, init) =>
        init?.method === 'POST'
          ? new Response(null, { status: 201 })
          : json([{ id: 'o-8', name: 'Acme', domains: [{ name: 'acme.test' }] }])
      );

      await expect(provider.createOrganization({ name: 'Acme', domain: 'acme.test' })).resolves.toEqual({
        id: 'o-8',
        name: 'Acme',
        domains: ['acme.test'],
      });
    });

    it('should add a member by posting the user id', async () => {
      const { provider, fetchMock } = createProvider(() => new Response(null, { status: 201 }));

      await provider.addUserToOrganization('u-1', 'o-1');

      expect(String(fetchMock.mock.calls[1]?.[0])).toBe(`${ADMIN_URL}/organizations/o-1/members`);
      expect(sentBody(fetchMock.mock.calls[1]?.[1])).toBe('u-1');
    });

    it('should treat removing an absent member or organization as success', async () => {
      const { provider } = createProvider(() => new Response(null, { status: 404 }));

      await expect(provider.removeUserFromOrganization('u-1', 'o-1')).resolves.toBeUndefined();
      await expect(provider.deleteOrganization('o-1')).resolves.toBeUndefined();
    });
  });

  describe('listRecentRegistrationEvents', () => {
    it('should query registrations in the window and map their details', async () => {
      const from = new Date('2024-06-01T10:50:00Z');
      const to = new Date('2024-06-01T12:00:00Z');
      const registeredAt = new Date('2024-06-01T11:30:00Z');
      const { provider, fetchMock } = createProvider(() =>
        json([
          {
            time: registeredAt.getTime(),
            type: 'REGISTER',
            userId: 'u-1',
            details: { email: 'kim@acme.test', first_name: 'Kim', last_name: 'Park', organization_id: 'o-1' },
          },
          { time: registeredAt.getTime(), type: 'REGISTER', details: {} },
        ])
      );

      const events = await provider.listRecentRegistrationEvents({ from, to });

      const url = new URL(String(fetchMock.mock.calls[1]?.[0]));
      expect(url.pathname).toBe('/admin/realms/tenants/events');
      expect(url.searchParams.get('type')).toBe('REGISTER');
      expect(url.searchParams.get('dateFrom')).toBe(String(from.getTime()));
      expect(url.searchParams.get('dateTo')).toBe(String(to.getTime()));
      expect(events).toEqual([
        {
          externalUserId: 'u-1',
          externalOrgId: 'o-1',
          email: 'kim@acme.test',
          firstName: 'Kim',
          lastName: 'Park',
          timestamp: registeredAt,
        },
        {
          externalUserId: undefined,
          externalOrgId: undefined,
          email: undefined,
          firstName: undefined,
          lastName: undefined,
          timestamp: registeredAt,
        },
      ]);
    });
  });
});
