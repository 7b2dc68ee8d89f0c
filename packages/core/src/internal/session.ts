/**
 * Produce sessions - one fresh owner per draft, revoked on return
 */

import type { Owner } from './types';

export interface Session {
  owner: Owner;
  check(): void;
  revoke(): void;
}

export function openSession(name: string): Session {
  let revoked = false;
  return {
    owner: {},
    check() {
      if (revoked) throw new TypeError(`Cannot use a draft after ${name}() has returned`);
    },
    revoke() {
      revoked = true;
    },
  };
}
