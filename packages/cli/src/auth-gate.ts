/**
 * Operator confirmation before sending
 */

import { createInterface } from 'node:readline/promises';
import type { AuthGate } from '@mac-enroll/transport';

/** Gate that always answers the same way (`--yes`, tests) */
export class StaticAuthGate implements AuthGate {
  constructor(private readonly allowed: boolean) {}

  async challenge(_reason: string): Promise<boolean> {
    return this.allowed;
  }
}

/**
 * Asks on the terminal; only "yes" passes. Refuses without a terminal.
 */
export class PromptAuthGate implements AuthGate {
  constructor(
    private readonly input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stderr
  ) {}

  async challenge(reason: string): Promise<boolean> {
    if (!this.input.isTTY) return false;

    const rl = createInterface({ input: this.input, output: this.output });
    try {
      const answer = await rl.question(`${reason} (type "yes"): `);
      return answer.trim().toLowerCase() === 'yes';
    } finally {
      rl.close();
    }
  }
}
