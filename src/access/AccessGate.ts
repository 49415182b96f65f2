import type { PublicKey } from '@solana/web3.js';
import { assertNotZeroAddress } from '../utils/encoding.js';

export interface AccessGate {
  isAuthorized(caller: PublicKey): boolean;
}

export class AdminGate implements AccessGate {
  constructor(readonly admin: PublicKey) {
    assertNotZeroAddress(admin, 'admin');
  }

  isAuthorized(caller: PublicKey): boolean {
    return caller.equals(this.admin);
  }
}
