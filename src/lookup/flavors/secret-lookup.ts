/**
 * Vault Secret Lookup
 *
 * Finds secrets by name within a compartment (optionally a single vault) and
 * returns the decoded payload of every match. Secret names are only unique
 * per vault, so a compartment-wide search can match several secrets; all of
 * them are returned and the aggregator warns about the ambiguity.
 */

import { z } from 'zod';
import type {
  SecretBundleApi,
  SecretBundleContent,
  SecretSearchApi,
} from '../../oci/clients.js';
import { LookupErrors, errorMessage } from '../../utils/errors.js';
import { Outcome, type FlavorName, type LookupFlavor, type LookupOutcome, type LookupScope } from '../types.js';
import { classifyFailure } from './classify.js';

export class SecretLookup implements LookupFlavor {
  readonly name: FlavorName = 'secret';
  readonly subject = 'secret';

  constructor(
    private readonly search: SecretSearchApi,
    private readonly bundles: SecretBundleApi
  ) {}

  async resolve(secretName: string, scope: LookupScope): Promise<LookupOutcome> {
    const compartmentId = scope.compartmentId;
    if (!compartmentId) {
      throw LookupErrors.CONFIGURATION_ERROR('"compartment_id" is required for the secret lookup');
    }

    let secretIds: string[];
    try {
      secretIds = await this.findSecretIds(secretName, compartmentId, scope.vaultId);
    } catch (error) {
      return classifyFailure(error, this.subject, secretName);
    }

    if (secretIds.length === 0) {
      return Outcome.missing();
    }

    const payloads: string[] = [];
    for (const secretId of secretIds) {
      let content: SecretBundleContent | undefined;
      try {
        const response = await this.bundles.getSecretBundle({
          secretId,
          versionNumber: scope.versionNumber,
        });
        content = response.secretBundle.secretBundleContent;
      } catch (error) {
        return classifyFailure(error, this.subject, secretName);
      }
      payloads.push(decodeSecretContent(secretId, content));
    }

    return Outcome.resolved(payloads);
  }

  /**
   * Every page of the name search, in service order.
   */
  private async findSecretIds(
    name: string,
    compartmentId: string,
    vaultId?: string
  ): Promise<string[]> {
    const ids: string[] = [];
    let page: string | undefined;

    do {
      const response = await this.search.listSecrets({ compartmentId, vaultId, name, page });
      ids.push(...response.items.map((item) => item.id));
      page = response.opcNextPage;
    } while (page);

    return ids;
  }
}

const Base64Schema = z.string().base64();

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Secret bundles are delivered base64-encoded; anything else is a response
 * this client does not understand. The payload must be strict base64 of
 * valid UTF-8.
 */
export function decodeSecretContent(
  secretId: string,
  content: SecretBundleContent | undefined
): string {
  if (!content || content.contentType !== 'BASE64' || content.content === undefined) {
    throw LookupErrors.UNEXPECTED_RESPONSE(
      'secret data get',
      `secret ${secretId} returned ${content ? content.contentType : 'no'} content`
    );
  }

  if (!Base64Schema.safeParse(content.content).success) {
    throw LookupErrors.UNEXPECTED_RESPONSE(
      'secret data get',
      `secret ${secretId} returned content that is not valid base64`
    );
  }

  try {
    return utf8.decode(Buffer.from(content.content, 'base64'));
  } catch (error) {
    throw LookupErrors.UNEXPECTED_RESPONSE(
      'secret data get',
      `secret ${secretId} returned content that is not valid UTF-8: ${errorMessage(error)}`
    );
  }
}
