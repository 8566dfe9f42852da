export class ConfigurationMissingError extends Error {
  readonly table: string;
  readonly ownerId: number;
  readonly key: string;

  constructor(input: { table: string; ownerId: number; key: string }) {
    super(`Missing ${input.key} in ${input.table} for ${input.ownerId}.`);
    this.name = "ConfigurationMissingError";
    this.table = input.table;
    this.ownerId = input.ownerId;
    this.key = input.key;
  }
}

export function isConfigurationMissingError(value: unknown): value is ConfigurationMissingError {
  return value instanceof ConfigurationMissingError;
}
