import type { Auth } from 'firebase-admin/auth';
import type { AuthUser } from '../types/user';

export interface NewIdentity {
  email: string;
  password: string;
  displayName: string;
}

/** The slice of the identity provider this service relies on. */
export interface IdentityProvider {
  verifyIdToken(token: string): Promise<{ uid: string }>;
  getUser(uid: string): Promise<AuthUser>;
  createUser(identity: NewIdentity): Promise<AuthUser>;
  updateDisplayName(uid: string, displayName: string): Promise<void>;
  createCustomToken(uid: string): Promise<string>;
}

interface UserRecordLike {
  uid: string;
  email?: string;
  displayName?: string;
  emailVerified: boolean;
  disabled: boolean;
}

function toAuthUser(record: UserRecordLike): AuthUser {
  return {
    uid: record.uid,
    email: record.email ?? '',
    displayName: record.displayName ?? null,
    emailVerified: record.emailVerified,
    disabled: record.disabled,
  };
}

export function createFirebaseIdentity(auth: Auth): IdentityProvider {
  return {
    async verifyIdToken(token) {
      const decoded = await auth.verifyIdToken(token);
      return { uid: decoded.uid };
    },

    async getUser(uid) {
      return toAuthUser(await auth.getUser(uid));
    },

    async createUser({ email, password, displayName }) {
      return toAuthUser(await auth.createUser({ email, password, displayName, disabled: false }));
    },

    async updateDisplayName(uid, displayName) {
      await auth.updateUser(uid, { displayName });
    },

    createCustomToken(uid) {
      return auth.createCustomToken(uid);
    },
  };
}
