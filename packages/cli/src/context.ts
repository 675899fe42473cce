import { InvalidArgumentError } from 'commander';
import { Bindery } from '@bindery/core';
import { type BinderyConfigOverrides, errorMessage } from '@bindery/shared';

export type CliOptions = {
  config?: string;
  repo?: string;
};

export type OpenBindery = (options: CliOptions, overrides?: BinderyConfigOverrides) => Promise<Bindery>;

/** Build a Bindery from the config file, environment and command-line flags. */
export const openBindery: OpenBindery = async (options, overrides = {}) => {
  const extensions = options.repo
    ? { ...overrides.extensions, repository: options.repo }
    : overrides.extensions;
  return Bindery.create({ ...overrides, extensions }, { configPath: options.config });
};

export function parseSourceId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id < 0) {
    throw new InvalidArgumentError('Source id must be a non-negative integer.');
  }
  return id;
}

/** Run a command body; failures print `Failed: <message>` and set exit code 1. */
export async function runAction(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.error(`Failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}
