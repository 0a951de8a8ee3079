export type Variables = Record<string, string>;

/**
 * Interpolate ${VAR} (hook variables) and ${ENV.NAME} (the given environment,
 * process.env by default) in a string. Unknown names become empty.
 */
export function interpolate(
  template: string,
  vars: Variables,
  env: NodeJS.ProcessEnv = process.env
): string {
  return template.replace(/\$\{(ENV\.)?(\w+)\}/g, (_match, isEnv: string | undefined, name: string) => {
    if (isEnv) {
      return env[name] ?? '';
    }
    return vars[name] ?? '';
  });
}
