import { FakeIdentityProvider } from './fake-identity-provider.js';
import { InMemoryStore, PROVIDER_ID } from './in-memory-store.js';
import { FailureLogService } from '../../src/services/failure-log.service.js';
import type { WorkflowDependencies } from '../../src/services/saga-steps.js';

export interface WorkflowHarness {
  provider: FakeIdentityProvider;
  store: InMemoryStore;
  deps: WorkflowDependencies;
}

export function createWorkflowHarness(): WorkflowHarness {
  const provider = new FakeIdentityProvider();
  const store = new InMemoryStore();
  const deps: WorkflowDependencies = {
    provider,
    store,
    failureLog: new FailureLogService(store.failureLogs),
    providerId: PROVIDER_ID,
    roles: { administrator: 'org-admin', member: 'org-user' },
    compensationTimeoutMs: 1000,
  };
  return { provider, store, deps };
}

/** Inserts a tenant mapped to `externalOrgId` and returns its internal id */
export async function seedTenant(store: InMemoryStore, externalOrgId: string, domain: string): Promise<string> {
  const tenant = await store.tenants.create({ name: `Tenant ${domain}`, domains: [domain] });
  await store.externalIdentities.create({
    provider_id: PROVIDER_ID,
    entity_type: 'tenant',
    entity_id: tenant.id,
    external_id: externalOrgId,
  });
  return tenant.id;
}

/** Inserts a mapped user with a membership and profile and returns its internal id */
export async function seedMember(
  store: InMemoryStore,
  tenantId: string,
  member: { externalUserId: string; email: string; roleIds: string[] }
): Promise<string> {
  const user = await store.users.create({ email: member.email });
  await store.externalIdentities.create({
    provider_id: PROVIDER_ID,
    entity_type: 'user',
    entity_id: user.id,
    external_id: member.externalUserId,
  });
  const membership = await store.memberships.create({
    tenant_id: tenantId,
    user_id: user.id,
    role_ids: member.roleIds,
  });
  await store.profiles.create({ membership_id: membership.id, first_name: 'Seed', last_name: 'Member' });
  return user.id;
}
