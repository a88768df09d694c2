import { Command } from 'commander';
import { lookup, type LookupDependencies } from './lookup/lookup.js';
import { listFlavors } from './lookup/registry.js';
import { errorMessage, sanitizeError } from './utils/errors.js';

export interface CliOptions {
  profile?: string;
  compartmentId?: string;
  vaultId?: string;
  versionNumber?: string;
  onMissing: string;
  onDenied: string;
  join: boolean;
  verbose?: boolean;
}

export interface CliDependencies extends LookupDependencies {
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

export function toLookupOptions(opts: CliOptions): Record<string, unknown> {
  return {
    oci_profile: opts.profile,
    compartment_id: opts.compartmentId,
    vault_id: opts.vaultId,
    version_number: opts.versionNumber,
    on_missing: opts.onMissing,
    on_denied: opts.onDenied,
    join: opts.join,
  };
}

export function createProgram(deps: CliDependencies = {}): Command {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(`${text}\n`));

  return new Command('oci-lookup')
    .description('Resolve OCI Vault secrets and instance credentials')
    .version('0.1.0')
    .argument('<flavor>', `lookup flavor (${listFlavors().join(', ')})`)
    .argument('<terms...>', 'secret names or instance OCIDs')
    .option('--profile <name>', 'OCI credentials profile name')
    .option('--compartment-id <ocid>', 'compartment OCID to search for secrets')
    .option('--vault-id <ocid>', 'vault OCID to search for secrets')
    .option('--version-number <n>', 'secret version to fetch')
    .option('--on-missing <action>', 'error, warn or skip when an item is missing', 'error')
    .option('--on-denied <action>', 'error, warn or skip when access is denied', 'error')
    .option('--join', 'concatenate all values into one', false)
    .option('--verbose', 'print error details on failure')
    .action(async (flavor: string, terms: string[], opts: CliOptions) => {
      try {
        const values = await lookup(flavor, terms, toLookupOptions(opts), deps);
        stdout(JSON.stringify(values));
      } catch (err) {
        stderr(`Error: ${errorMessage(err)}`);
        if (opts.verbose) {
          stderr(JSON.stringify(sanitizeError(err)));
        }
        process.exitCode = 1;
      }
    });
}
