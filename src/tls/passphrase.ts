import * as readline from "node:readline/promises";
import type { Readable, Writable } from "node:stream";

export interface PassphraseRequest {
  /** Human-readable name of the protected material, usually its path. */
  label: string;
}

/** Supplies the passphrase for an encrypted key; undefined means none. */
export type PassphraseProvider = (
  request: PassphraseRequest,
) => Promise<string | undefined>;

/** Returns a fixed value, typically `PYTAK_TLS_CLIENT_PASSWORD`. */
export const configPassphraseProvider =
  (value: string | undefined): PassphraseProvider =>
  async () =>
    value;

export interface PromptOptions {
  input?: Readable;
  output?: Writable;
}

/** Asks on a terminal. An empty answer counts as no passphrase. */
export function promptPassphraseProvider(
  options: PromptOptions = {},
): PassphraseProvider {
  return async ({ label }) => {
    const rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
      terminal: false,
    });
    try {
      const answer = await rl.question(`Passphrase for ${label}: `);
      return answer === "" ? undefined : answer;
    } finally {
      rl.close();
    }
  };
}

/** First provider to return a non-empty passphrase wins. */
export const chainPassphraseProviders =
  (...providers: PassphraseProvider[]): PassphraseProvider =>
  async request => {
    for (const provider of providers) {
      const value = await provider(request);
      if (value) return value;
    }
    return undefined;
  };
