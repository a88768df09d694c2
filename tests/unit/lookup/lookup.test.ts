/**
 * Unit Tests for the lookup entry point
 *
 * Wires option parsing, environment configuration, auth resolution and a
 * flavor together against in-process OCI fakes.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { lookup, toLookupScope } from '../../../src/lookup/lookup.js';
import { parseLookupOptions } from '../../../src/config/index.js';
import { AuditService, InMemoryAuditStorage } from '../../../src/core/audit-service.js';
import {
  FakeComputeService,
  FakeServiceError,
  FakeVaultService,
  TEST_COMPARTMENT,
  fakeAuthFactory,
  fakeClientFactory,
  recordingDisplay,
} from '../../helpers/fake-oci.js';

describe('lookup', () => {
  let vault: FakeVaultService;
  let compute: FakeComputeService;
  let authFactory: ReturnType<typeof fakeAuthFactory>;
  let display: ReturnType<typeof recordingDisplay>;

  const env = { OCI_CLI_CONFIG_FILE: '/home/test/.oci/config' };

  beforeEach(() => {
    vault = new FakeVaultService();
    compute = new FakeComputeService();
    authFactory = fakeAuthFactory();
    display = recordingDisplay();
  });

  function deps(extra: { env?: NodeJS.ProcessEnv; auditService?: AuditService } = {}) {
    return {
      env: extra.env ?? env,
      authFactory,
      clientFactory: fakeClientFactory(vault, compute),
      display,
      auditService: extra.auditService,
    };
  }

  describe('secret flavor', () => {
    it('should resolve secrets in input order', async () => {
      vault.addSecret('db_user', 'admin');
      vault.addSecret('db_password', 'test-secret');

      const values = await lookup(
        'secret',
        ['db_password', 'db_user'],
        { compartment_id: TEST_COMPARTMENT },
        deps()
      );

      expect(values).toEqual(['test-secret', 'admin']);
      expect(authFactory.fromConfigFile).toHaveBeenCalledWith('/home/test/.oci/config', 'DEFAULT');
    });

    it('should join secrets into one value', async () => {
      vault.addSecret('part1', 'a');
      vault.addSecret('part2', 'b');
      vault.addSecret('part3', 'c');

      await expect(
        lookup(
          'secret',
          ['part1', 'part2', 'part3'],
          { compartment_id: TEST_COMPARTMENT, join: true },
          deps()
        )
      ).resolves.toEqual(['abc']);
    });

    it('should skip a missing secret when asked', async () => {
      vault.addSecret('first', '1');
      vault.addSecret('third', '3');

      await expect(
        lookup(
          'secret',
          ['first', 'second', 'third'],
          { compartment_id: TEST_COMPARTMENT, on_missing: 'skip' },
          deps()
        )
      ).resolves.toEqual(['1', '3']);
      expect(display.warnings).toEqual([]);
    });

    it('should abort on a missing secret by default', async () => {
      vault.addSecret('first', '1');

      await expect(
        lookup('secret', ['first', 'second'], { compartment_id: TEST_COMPARTMENT }, deps())
      ).rejects.toThrow('Failed to find secret second (ResourceNotFound)');
    });

    it('should return both secrets sharing a name with a warning', async () => {
      vault.addSecret('shared', 'from-vault-a', { vaultId: 'ocid1.vault.oc1..a' });
      vault.addSecret('shared', 'from-vault-b', { vaultId: 'ocid1.vault.oc1..b' });

      await expect(
        lookup('secret', ['shared'], { compartment_id: TEST_COMPARTMENT }, deps())
      ).resolves.toEqual(['from-vault-a', 'from-vault-b']);
      expect(display.warnings).toEqual(['More than one secret found with name shared']);
    });

    it('should warn and continue on a denied secret', async () => {
      vault.addSecret('id1', 'payload-1');
      vault.failSearch('id2', new FakeServiceError(404, 'NotAuthorizedOrNotFound', 'Authorization failed'));

      await expect(
        lookup(
          'secret',
          ['id1', 'id2'],
          { compartment_id: TEST_COMPARTMENT, on_denied: 'warn' },
          deps()
        )
      ).resolves.toEqual(['payload-1']);
      expect(display.warnings).toEqual(['Skipping, access denied to secret id2: Authorization failed']);
    });

    it('should fetch a pinned version', async () => {
      const id = vault.addSecret('rotated', 'old');
      vault.addVersion(id, 'new');

      await expect(
        lookup('secret', ['rotated'], { compartment_id: TEST_COMPARTMENT, version_number: 1 }, deps())
      ).resolves.toEqual(['old']);
    });
  });

  describe('instance flavors', () => {
    const instance = 'ocid1.instance.oc1.eu-frankfurt-1.test';

    it('should return instance credentials as JSON', async () => {
      compute.addInstance(instance, 'opc', 'test-password');

      await expect(lookup('instance-credentials', [instance], {}, deps())).resolves.toEqual([
        '{"username":"opc","password":"test-password"}',
      ]);
    });

    it('should return only the password for windows-password', async () => {
      compute.addInstance(instance, 'opc', 'test-password');

      await expect(lookup('windows-password', [instance], {}, deps())).resolves.toEqual([
        'test-password',
      ]);
    });

    it('should warn about an unknown instance when on_missing=warn', async () => {
      await expect(
        lookup('windows-password', ['ocid1.instance.oc1..gone'], { on_missing: 'WARN' }, deps())
      ).resolves.toEqual([]);
      expect(display.warnings).toEqual(['Skipping, did not find instance password ocid1.instance.oc1..gone']);
    });
  });

  describe('authentication', () => {
    it('should use instance principal auth without touching the credential file', async () => {
      compute.addInstance('ocid1.instance.oc1..a', 'opc', 'test-password');

      await lookup(
        'windows-password',
        ['ocid1.instance.oc1..a'],
        { oci_profile: 'DEV' },
        deps({ env: { OCI_CLI_AUTH: 'instance_principal' } })
      );

      expect(authFactory.fromInstancePrincipal).toHaveBeenCalledTimes(1);
      expect(authFactory.fromConfigFile).not.toHaveBeenCalled();
    });

    it('should let OCI_CONFIG_PROFILE win over oci_profile', async () => {
      compute.addInstance('ocid1.instance.oc1..a', 'opc', 'test-password');

      await lookup(
        'windows-password',
        ['ocid1.instance.oc1..a'],
        { oci_profile: 'DEV' },
        deps({ env: { ...env, OCI_CONFIG_PROFILE: 'PROD' } })
      );

      expect(authFactory.fromConfigFile).toHaveBeenCalledWith('/home/test/.oci/config', 'PROD');
    });

    it('should fall back to oci_profile when OCI_CONFIG_PROFILE is empty', async () => {
      compute.addInstance('ocid1.instance.oc1..a', 'opc', 'test-password');

      await lookup(
        'windows-password',
        ['ocid1.instance.oc1..a'],
        { oci_profile: 'DEV' },
        deps({ env: { ...env, OCI_CONFIG_PROFILE: '' } })
      );

      expect(authFactory.fromConfigFile).toHaveBeenCalledWith('/home/test/.oci/config', 'DEV');
    });

    it('should report credential file problems as configuration errors', async () => {
      authFactory.fromConfigFile.mockImplementation(() => {
        throw new Error('Config file /home/test/.oci/config is not found');
      });

      await expect(
        lookup('windows-password', ['ocid1.instance.oc1..a'], {}, deps())
      ).rejects.toMatchObject({
        code: 'CONFIGURATION_ERROR',
        message: 'Failed to load OCI authentication: Config file /home/test/.oci/config is not found',
      });
    });

    it('should record the auth context in the audit trail', async () => {
      const auditService = new AuditService({ enabled: true });
      compute.addInstance('ocid1.instance.oc1..a', 'opc', 'test-password');

      await lookup('windows-password', ['ocid1.instance.oc1..a'], {}, deps({ auditService }));

      const storage = auditService._getStorage();
      const entries = storage instanceof InMemoryAuditStorage ? storage.getEntries() : [];
      expect(entries[0]).toMatchObject({
        source: 'lookup:auth',
        action: 'resolve_auth_context',
        reason: 'profile DEFAULT (/home/test/.oci/config)',
      });
      expect(entries[1]).toMatchObject({
        source: 'lookup:windows-password',
        action: 'resolve:ocid1.instance.oc1..a',
        success: true,
      });
    });
  });

  describe('configuration errors', () => {
    it('should reject a bad policy before authenticating', async () => {
      await expect(
        lookup('secret', ['x'], { compartment_id: TEST_COMPARTMENT, on_missing: 'explode' }, deps())
      ).rejects.toThrow(
        '"on_missing" must be a string and one of "error", "warn" or "skip", not explode'
      );
      expect(authFactory.fromConfigFile).not.toHaveBeenCalled();
      expect(vault.calls).toHaveLength(0);
    });

    it('should reject an unknown flavor', async () => {
      await expect(lookup('certificate', ['x'], {}, deps())).rejects.toMatchObject({
        code: 'CONFIGURATION_ERROR',
      });
      expect(authFactory.fromConfigFile).not.toHaveBeenCalled();
    });

    it('should require a compartment for secrets before authenticating', async () => {
      await expect(lookup('secret', ['x'], {}, deps())).rejects.toThrow(
        '"compartment_id" is required for the secret lookup'
      );
      expect(authFactory.fromConfigFile).not.toHaveBeenCalled();
    });

    it('should reject an unknown auth mode', async () => {
      await expect(
        lookup('windows-password', ['x'], {}, deps({ env: { OCI_CLI_AUTH: 'resource_principal' } }))
      ).rejects.toThrow('Invalid value for "OCI_CLI_AUTH"');
    });
  });
});

describe('toLookupScope', () => {
  it('should map options onto scope qualifiers', () => {
    const options = parseLookupOptions({
      compartment_id: 'ocid1.compartment.oc1..c',
      vault_id: 'ocid1.vault.oc1..v',
      version_number: 2,
    });

    expect(toLookupScope(options)).toEqual({
      compartmentId: 'ocid1.compartment.oc1..c',
      vaultId: 'ocid1.vault.oc1..v',
      versionNumber: 2,
    });
  });
});
