/**
 * Instance Credentials Lookups
 *
 * Windows instances get a generated username/password at launch. These two
 * flavors return either the whole credential pair (as JSON) or just the
 * password.
 */

import type { InstanceCredentials, InstanceCredentialsApi } from '../../oci/clients.js';
import { Outcome, type FlavorName, type LookupFlavor, type LookupOutcome } from '../types.js';
import { classifyFailure } from './classify.js';

export class InstanceCredentialsLookup implements LookupFlavor {
  readonly name: FlavorName = 'instance-credentials';
  readonly subject: string = 'instance credentials';

  constructor(private readonly compute: InstanceCredentialsApi) {}

  async resolve(instanceId: string): Promise<LookupOutcome> {
    let credentials: InstanceCredentials;
    try {
      const response = await this.compute.getWindowsInstanceInitialCredentials({ instanceId });
      credentials = response.instanceCredentials;
    } catch (error) {
      return classifyFailure(error, this.subject, instanceId, { notFoundIsMissing: true });
    }

    return Outcome.resolved([this.render(credentials)]);
  }

  protected render(credentials: InstanceCredentials): string {
    return JSON.stringify({ username: credentials.username, password: credentials.password });
  }
}

export class WindowsPasswordLookup extends InstanceCredentialsLookup {
  readonly name: FlavorName = 'windows-password';
  readonly subject: string = 'instance password';

  protected render(credentials: InstanceCredentials): string {
    return credentials.password;
  }
}
