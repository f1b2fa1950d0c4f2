import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@typedwire/core';
import {
  createConfiguration,
  defaultConfiguration,
  withDiscriminator,
  withKebabCaseMemberNames,
  withNamingPolicy,
  withSnakeCaseMemberNames,
} from '../src/index.js';

describe('createConfiguration', () => {
  it('defaults to identity naming without a discriminator', () => {
    expect(defaultConfiguration.naming).toBe('identity');
    expect(defaultConfiguration.toEncodedName('fruitAmount')).toBe('fruitAmount');
    expect(defaultConfiguration.discriminator).toBeUndefined();
  });

  it('resolves named policies for fields and discriminator values', () => {
    const configuration = createConfiguration({ naming: 'snake_case', discriminator: 'kind' });

    expect(configuration.toEncodedName('fruitAmount')).toBe('fruit_amount');
    expect(configuration.toDiscriminatorValue('FruitAmount')).toBe('fruit_amount');
    expect(configuration.discriminator).toBe('kind');
  });

  it('accepts custom naming functions', () => {
    const configuration = createConfiguration({ naming: (name) => `x_${name}` });

    expect(configuration.toEncodedName('id')).toBe('x_id');
  });

  it('keeps a separate policy for discriminator values', () => {
    const configuration = createConfiguration({ naming: 'snake_case', discriminatorValue: 'kebab-case' });

    expect(configuration.toEncodedName('FruitAmount')).toBe('fruit_amount');
    expect(configuration.toDiscriminatorValue('FruitAmount')).toBe('fruit-amount');
  });

  it('freezes the result', () => {
    expect(Object.isFrozen(createConfiguration({ discriminator: 'kind' }))).toBe(true);
  });

  it('rejects an empty discriminator field', () => {
    expect(() => createConfiguration({ discriminator: '' })).toThrow(ConfigurationError);
    expect(() => createConfiguration({ discriminator: '' })).toThrow('Invalid configuration: discriminator:');
  });

  it('rejects unknown settings', () => {
    const input = { naming: 'identity' as const, separator: '-' };

    expect(() => createConfiguration(input)).toThrow(ConfigurationError);
  });
});

describe('configuration helpers', () => {
  it('sets the discriminator and keeps the naming policy', () => {
    const configuration = withDiscriminator(withSnakeCaseMemberNames(), 'type');

    expect(configuration.discriminator).toBe('type');
    expect(configuration.toEncodedName('firstName')).toBe('first_name');
  });

  it('keeps the discriminator when the naming policy changes', () => {
    const configuration = withKebabCaseMemberNames(withDiscriminator(defaultConfiguration, 'kind'));

    expect(configuration.discriminator).toBe('kind');
    expect(configuration.toEncodedName('firstName')).toBe('first-name');
  });

  it('switches between policies', () => {
    const configuration = withNamingPolicy(withSnakeCaseMemberNames(), 'SCREAMING_SNAKE_CASE');

    expect(configuration.toEncodedName('firstName')).toBe('FIRST_NAME');
  });

  it('validates the discriminator field name', () => {
    expect(() => withDiscriminator(defaultConfiguration, '')).toThrow('Invalid discriminator field name');
  });
});
