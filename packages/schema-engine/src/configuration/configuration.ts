/**
 * Configuration factory
 *
 * Validates user input with zod and freezes the result, so a configuration
 * cannot change while a derivation is running.
 */

import type { ZodError } from 'zod';
import type { Configuration, ConfigurationInput, NamingPolicy } from '@typedwire/core';
import {
  ConfigurationError,
  configurationInputSchema,
  discriminatorFieldSchema,
  resolveNamingPolicy,
} from '@typedwire/core';

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

export function createConfiguration(input: ConfigurationInput = {}): Configuration {
  const parsed = configurationInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }

  // Functions are taken from the input itself: zod would wrap them in argument checks.
  const naming = input.naming ?? 'identity';
  const toEncodedName = resolveNamingPolicy(naming);

  return Object.freeze({
    naming,
    toEncodedName,
    toDiscriminatorValue: input.discriminatorValue ? resolveNamingPolicy(input.discriminatorValue) : toEncodedName,
    ...(input.discriminatorValue ? { discriminatorValue: input.discriminatorValue } : {}),
    ...(input.discriminator !== undefined ? { discriminator: input.discriminator } : {}),
  });
}

/** Identity naming, no discriminator */
export const defaultConfiguration: Configuration = createConfiguration();

function toInput(configuration: Configuration): ConfigurationInput {
  return {
    naming: configuration.naming,
    ...(configuration.discriminatorValue ? { discriminatorValue: configuration.discriminatorValue } : {}),
    ...(configuration.discriminator !== undefined ? { discriminator: configuration.discriminator } : {}),
  };
}

export function withDiscriminator(configuration: Configuration, discriminator: string): Configuration {
  const parsed = discriminatorFieldSchema.safeParse(discriminator);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid discriminator field name: ${formatIssues(parsed.error)}`);
  }
  return createConfiguration({ ...toInput(configuration), discriminator });
}

/**
 * Replace the field naming policy. Discriminator values follow it unless a
 * separate discriminator value policy was configured.
 */
export function withNamingPolicy(configuration: Configuration, naming: NamingPolicy): Configuration {
  return createConfiguration({ ...toInput(configuration), naming });
}

export function withSnakeCaseMemberNames(configuration: Configuration = defaultConfiguration): Configuration {
  return withNamingPolicy(configuration, 'snake_case');
}

export function withKebabCaseMemberNames(configuration: Configuration = defaultConfiguration): Configuration {
  return withNamingPolicy(configuration, 'kebab-case');
}
