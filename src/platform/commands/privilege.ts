/**
 * Prefix argv with sudo unless already root. Environment assignments are passed as
 * `VAR=value` arguments because sudo resets the caller's environment.
 */
export function elevate(argv: string[], useSudo: boolean, env: Record<string, string> = {}): string[] {
  if (!useSudo) return argv;
  const assignments = Object.entries(env).map(([k, v]) => `${k}=${v}`);
  return ["sudo", ...assignments, ...argv];
}
