import { z } from "zod";
import { ValidationError } from "./errors.js";

export const USERNAME_MAX_LENGTH = 32;
export const PASSWORD_MIN_LENGTH = 8;

export const usernameSchema = z
  .string()
  .min(1, "Username cannot be empty")
  .max(USERNAME_MAX_LENGTH, `Username must be at most ${USERNAME_MAX_LENGTH} characters`)
  .regex(/^[a-z_][a-z0-9_-]*$/, "Invalid username. Use only lowercase letters, numbers, underscore and dash, starting with a letter or underscore");

export const passwordSchema = z
  .string()
  .min(PASSWORD_MIN_LENGTH, `Password must be at least ${PASSWORD_MIN_LENGTH} characters long`);

export const timezoneSchema = z
  .string()
  .regex(/^[A-Za-z0-9_+-]+(\/[A-Za-z0-9_+-]+)*$/, "Timezone must look like Region/City, e.g. Europe/Berlin");

/** Everything needed to materialize one account. The password is used once and dropped. */
export const userSpecSchema = z.object({
  username: usernameSchema,
  password: passwordSchema.nullable(),
  grant_sudo: z.boolean(),
  passwordless_sudo: z.boolean(),
  docker_group: z.boolean(),
});

export type UserSpec = z.infer<typeof userSpecSchema>;

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? "Invalid value";
}

export function validateUsername(input: string): string {
  const parsed = usernameSchema.safeParse(input);
  if (!parsed.success) throw new ValidationError(firstIssue(parsed.error), { field: "username" });
  return parsed.data;
}

/** Checks length and the confirmation; the password itself never appears in the error. */
export function validatePassword(password: string, confirmation: string): string {
  const parsed = passwordSchema.safeParse(password);
  if (!parsed.success) throw new ValidationError(firstIssue(parsed.error), { field: "password" });
  if (password !== confirmation) throw new ValidationError("Passwords do not match", { field: "password" });
  return parsed.data;
}

/**
 * Validate a timezone name. When the system's zone list is known the name must be on it.
 */
export function validateTimezone(input: string, known: readonly string[]): string {
  const parsed = timezoneSchema.safeParse(input.trim());
  if (!parsed.success) throw new ValidationError(firstIssue(parsed.error), { field: "timezone" });
  if (known.length > 0 && !known.includes(parsed.data)) {
    throw new ValidationError(`Unknown timezone: ${parsed.data}`, { field: "timezone" });
  }
  return parsed.data;
}

export function parseUserSpec(input: UserSpec): UserSpec {
  const parsed = userSpecSchema.safeParse(input);
  if (!parsed.success) throw new ValidationError(firstIssue(parsed.error), { field: "user" });
  return parsed.data;
}
