import { background, type Scope } from "../core/scope.js";
import { withValue } from "../core/derive.js";
import { createKey } from "../context/key.js";
import { requireValue } from "../context/context.js";
import { resolveDemoOptions, type DemoLogger, type DemoOptions } from "./shared.js";

export const UsernameKey = createKey<string>("username");
export const PasswordKey = createKey<string>("password");

export interface Credentials {
  username: string;
  password: string;
}

function mask(secret: string): string {
  return "*".repeat(secret.length);
}

function validateData(label: string, { username, password }: Credentials, log: DemoLogger): void {
  log(`[${label}] Username: ${username}, password: ${mask(password)} is valid`);
}

function saveData(label: string, { username, password }: Credentials, log: DemoLogger): void {
  log(`[${label}] Username: ${username}, password: ${mask(password)} is saved`);
}

/**
 * Threads the credentials through every call by hand.
 */
export function operationWithoutValue(username: string, password: string, options?: DemoOptions): Credentials {
  const { log } = resolveDemoOptions(options);
  const label = "Without scope";
  log(`[${label}] Start processing`);

  validateData(label, { username, password }, log);
  saveData(label, { username, password }, log);

  log(`[${label}] Finish`);
  return { username, password };
}

function credentialsFrom(scope: Scope): Credentials {
  return {
    username: requireValue(scope, UsernameKey),
    password: requireValue(scope, PasswordKey),
  };
}

/**
 * Reads the credentials from the scope's bindings at each step.
 */
export function operationWithValue(scope: Scope, options?: DemoOptions): Credentials {
  const { log } = resolveDemoOptions(options);
  const label = "With scope";
  log(`[${label}] Start processing`);

  validateData(label, credentialsFrom(scope), log);
  saveData(label, credentialsFrom(scope), log);

  log(`[${label}] Finish`);
  return credentialsFrom(scope);
}

export function simulateValue(
  credentials: Credentials,
  options?: DemoOptions
): { withoutValue: Credentials; withValue: Credentials } {
  const withoutValue = operationWithoutValue(credentials.username, credentials.password, options);

  let scope = background();
  scope = withValue(scope, UsernameKey, credentials.username);
  scope = withValue(scope, PasswordKey, credentials.password);

  return { withoutValue, withValue: operationWithValue(scope, options) };
}
