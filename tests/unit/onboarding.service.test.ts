import { describe, it, expect, beforeEach, vi } from 'vitest';
import { OnboardingService } from '../../src/services/onboarding.service.js';
import { IdentityProviderError } from '../../src/providers/base.provider.js';
import { ADMIN_ROLE_ID } from '../helpers/in-memory-store.js';
import { createWorkflowHarness, type WorkflowHarness } from '../helpers/workflow.js';

const admin = { email: 'ada@acme.test', firstName: 'Ada', lastName: 'Lovelace' };
const acme = { name: 'Acme', domain: 'acme.test' };

describe('OnboardingService', () => {
  let harness: WorkflowHarness;
  let service: OnboardingService;

  beforeEach(() => {
    harness = createWorkflowHarness();
    service = new OnboardingService(harness.deps);
  });

  describe('onboardOrganization', () => {
    it('should create one user, one tenant, both mappings and an administrator membership', async () => {
      const { store, provider } = harness;

      const result = await service.onboardOrganization(admin, acme);

      expect(result).toEqual({ userId: 'user-1', tenantId: 'tenant-4' });
      expect(store.data.users).toHaveLength(1);
      expect(store.data.tenants).toHaveLength(1);
      expect(store.data.externalIdentities.map(e => [e.entity_type, e.entity_id, e.external_id])).toEqual([
        ['user', 'user-1', 'ext-user-1'],
        ['tenant', 'tenant-4', 'ext-org-2'],
      ]);
      expect(store.data.memberships).toHaveLength(1);
      expect(store.data.memberships[0]).toMatchObject({
        tenant_id: 'tenant-4',
        user_id: 'user-1',
        role_ids: [ADMIN_ROLE_ID],
      });
      expect(store.data.profiles[0]).toMatchObject({ first_name: 'Ada', last_name: 'Lovelace' });
      expect(store.commits).toBe(1);
      expect(provider.membersOf('ext-org-2')).toEqual(['ext-user-1']);
    });

    it('should call the provider in saga order', async () => {
      await service.onboardOrganization(admin, acme);

      expect(harness.provider.calls).toEqual([
        'findUserByEmail:ada@acme.test',
        'createUser:ada@acme.test',
        'createOrganization:acme.test',
        'addUserToOrganization:ext-user-1@ext-org-2',
      ]);
    });

    it('should record audit entries for the user, the tenant and the membership', async () => {
      await service.onboardOrganization(admin, acme);

      expect(harness.store.data.auditLogs.map(a => `${a.entity_type}:${a.action}`)).toEqual([
        'user:created',
        'tenant:created',
        'membership:created',
      ]);
      expect(harness.store.data.auditLogs[1]?.tenant_id).toBe('tenant-4');
    });

    it('should pass the caller signal to every provider call', async () => {
      const controller = new AbortController();

      await service.onboardOrganization(admin, acme, { signal: controller.signal });

      expect(harness.provider.signals).toHaveLength(4);
      expect(harness.provider.signals.every(s => s === controller.signal)).toBe(true);
    });

    it('should delete a newly created user when organization creation fails', async () => {
      const { provider, store } = harness;
      provider.failOn('createOrganization', new IdentityProviderError('boom', 'create_organization', 'fake', 500));

      await expect(service.onboardOrganization(admin, acme)).rejects.toThrow('boom');

      expect(provider.calls.at(-1)).toBe('deleteUser:ext-user-1');
      expect(provider.users.size).toBe(0);
      expect(store.data.users).toEqual([]);
      expect(store.data.tenants).toEqual([]);
      expect(store.transactionsStarted).toBe(0);
    });

    it('should undo every provider step in reverse order when the commit fails', async () => {
      const { provider, store } = harness;
      store.failOn('commit', new Error('deadlock detected'));

      await expect(service.onboardOrganization(admin, acme)).rejects.toThrow('deadlock detected');

      expect(provider.calls.slice(-3)).toEqual([
        'removeUserFromOrganization:ext-user-1@ext-org-2',
        'deleteOrganization:ext-org-2',
        'deleteUser:ext-user-1',
      ]);
      expect(store.rollbacks).toBe(1);
      expect(store.commits).toBe(0);
      expect(store.data.users).toEqual([]);
      expect(store.data.tenants).toEqual([]);
      expect(store.data.externalIdentities).toEqual([]);
      expect(provider.organizations.size).toBe(0);
      expect(provider.users.size).toBe(0);
    });

    it('should roll back the open transaction when a local write fails', async () => {
      const { provider, store } = harness;
      store.failOn('memberships.create', new Error('constraint violation'));

      await expect(service.onboardOrganization(admin, acme)).rejects.toThrow('constraint violation');

      expect(store.rollbacks).toBe(1);
      expect(store.data.tenants).toEqual([]);
      expect(provider.organizations.size).toBe(0);
    });

    it('should never delete a user that already existed in the provider', async () => {
      const { provider, store } = harness;
      provider.seedUser({ id: 'ext-existing', username: 'ada', email: admin.email, firstName: 'Ada', lastName: 'Lovelace' });
      store.failOn('commit', new Error('deadlock detected'));

      await expect(service.onboardOrganization(admin, acme)).rejects.toThrow('deadlock detected');

      expect(provider.users.has('ext-existing')).toBe(true);
      expect(provider.calls.some(c => c.startsWith('deleteUser'))).toBe(false);
      expect(provider.calls.some(c => c.startsWith('createUser'))).toBe(false);
    });

    it('should keep an existing provider user when organization creation fails', async () => {
      const { provider } = harness;
      provider.seedUser({ id: 'ext-existing', username: 'ada', email: admin.email, firstName: 'Ada', lastName: 'Lovelace' });
      provider.failOn('createOrganization', new Error('boom'));

      await expect(service.onboardOrganization(admin, acme)).rejects.toThrow('boom');

      expect(provider.users.has('ext-existing')).toBe(true);
      expect(provider.calls).toEqual(['findUserByEmail:ada@acme.test', 'createOrganization:acme.test']);
    });

    it('should reuse the local user of an administrator onboarding a second organization', async () => {
      const { store, provider } = harness;

      const first = await service.onboardOrganization(admin, acme);
      const second = await service.onboardOrganization(admin, { name: 'Globex', domain: 'globex.test' });

      expect(second.userId).toBe(first.userId);
      expect(second.tenantId).not.toBe(first.tenantId);
      expect(store.data.users).toHaveLength(1);
      expect(store.data.tenants).toHaveLength(2);
      expect(store.data.memberships).toHaveLength(2);
      expect(provider.calls.filter(c => c.startsWith('createUser'))).toHaveLength(1);
    });

    it('should surface a duplicate domain as the provider error', async () => {
      await service.onboardOrganization(admin, acme);

      const rival = { email: 'bob@rival.test', firstName: 'Bob', lastName: 'Rival' };
      const error = await service.onboardOrganization(rival, acme).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IdentityProviderError);
      expect(harness.provider.users.size).toBe(1);
    });

    it('should write a failure record after compensating', async () => {
      const { store, provider } = harness;
      provider.failOn('addUserToOrganization', new Error('link refused'));

      await expect(service.onboardOrganization(admin, acme)).rejects.toThrow('link refused');

      expect(store.data.failureLogs).toHaveLength(1);
      expect(store.data.failureLogs[0]).toMatchObject({
        workflow: 'onboarding',
        external_user_id: 'ext-user-1',
        external_org_id: 'ext-org-2',
        email: 'ada@acme.test',
        first_name: 'Ada',
        last_name: 'Lovelace',
        error_message: 'link refused',
        failed_step: 'link_user_to_organization',
        compensation_succeeded: true,
        compensation_errors: [],
      });
    });

    it('should record a failed compensation in the failure record', async () => {
      const { store, provider } = harness;
      provider.failOn('addUserToOrganization', new Error('link refused'));
      provider.failOn('deleteOrganization', new Error('provider unavailable'));

      await expect(service.onboardOrganization(admin, acme)).rejects.toThrow('link refused');

      expect(provider.calls.at(-1)).toBe('deleteUser:ext-user-1');
      expect(store.data.failureLogs[0]?.compensation_succeeded).toBe(false);
      expect(store.data.failureLogs[0]?.compensation_errors).toEqual([
        'Compensation of step create_organization failed: provider unavailable',
      ]);
    });

    it('should not write a failure record when the provider refuses the first call', async () => {
      const { store, provider } = harness;
      provider.failOn('findUserByEmail', new IdentityProviderError('Forbidden', 'find_user_by_email', 'fake', 403));

      await expect(service.onboardOrganization(admin, acme)).rejects.toThrow('Forbidden');

      expect(store.data.failureLogs).toEqual([]);
    });

    it('should record a user whose creation failed after the provider stored it', async () => {
      const { store, provider } = harness;
      const createUser = provider.createUser.bind(provider);
      vi.spyOn(provider, 'createUser').mockImplementationOnce(async (input, options) => {
        await createUser(input, options);
        throw new Error('network reset');
      });

      await expect(service.onboardOrganization(admin, acme)).rejects.toThrow('network reset');

      expect(provider.users.size).toBe(1);
      expect(store.data.failureLogs).toEqual([
        expect.objectContaining({
          workflow: 'onboarding',
          email: 'ada@acme.test',
          error_message: 'network reset',
          failed_step: 'resolve_or_create_user',
          compensation_succeeded: true,
        }),
      ]);
    });

    it('should not look the user up again once the provider returns it', async () => {
      const { provider } = harness;
      const findUserByEmail = provider.findUserByEmail.bind(provider);
      vi.spyOn(provider, 'findUserByEmail')
        .mockImplementationOnce(findUserByEmail)
        .mockRejectedValueOnce(new Error('network reset'));

      await expect(service.onboardOrganization(admin, acme)).resolves.toEqual({ userId: 'user-1', tenantId: 'tenant-4' });

      expect(provider.users.size).toBe(1);
      expect(provider.calls.filter(c => c.startsWith('findUserByEmail'))).toHaveLength(1);
    });

    it('should reject with the workflow error when the failure record cannot be written', async () => {
      const { store, provider } = harness;
      provider.failOn('createOrganization', new Error('boom'));
      store.failOn('failureLogs.create', new Error('database unavailable'));

      await expect(service.onboardOrganization(admin, acme)).rejects.toThrow('boom');
    });
  });
});
