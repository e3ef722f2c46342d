import type { PlatformStore } from "../store/platform-store.js";
import type { UserProfile } from "../types/domain.js";

/** Resolves an authenticated subject into the directory profile the workflows act on. */
export interface IdentityProvider {
  resolve(userId: string): Promise<UserProfile | undefined>;
}

export class StoreIdentityProvider implements IdentityProvider {
  constructor(private readonly store: PlatformStore) {}

  async resolve(userId: string): Promise<UserProfile | undefined> {
    const user = await this.store.getUser(userId);
    if (!user || !user.active) {
      return undefined;
    }
    return user;
  }
}
