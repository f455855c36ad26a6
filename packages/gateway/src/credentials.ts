/**
 * Source of the signed-in user's identity. Token acquisition lives outside
 * this library; a missing token means "not authenticated".
 */
export interface CredentialProvider {
  currentUserId(): string;
  currentIdToken(): Promise<string | null>;
}

export class StaticCredentialProvider implements CredentialProvider {
  constructor(
    private readonly userId: string,
    private readonly idToken: string | null,
  ) {}

  currentUserId(): string {
    return this.userId;
  }

  async currentIdToken(): Promise<string | null> {
    return this.idToken && this.idToken.length > 0 ? this.idToken : null;
  }
}
