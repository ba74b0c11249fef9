import type { Principal } from '@cloak/protocol';

/**
 * Holds the single privileged principal of a deployed instance.
 */
export interface AdminRepository {
  /**
   * @returns The current admin, or null before initialization
   */
  get(): Promise<Principal | null>;

  set(admin: Principal): Promise<void>;
}
