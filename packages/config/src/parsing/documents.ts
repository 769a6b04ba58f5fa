export type SettingsDocument = Readonly<Record<string, unknown>>;

export function isSettingsDocument(value: unknown): value is SettingsDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
