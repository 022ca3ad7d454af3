export type Credential = Readonly<{
  username: string
  password: string
}>

/**
 * Issued bearer tokens and the credential each one stands for.
 *
 * Owned by a server instance; entries live as long as the instance. Every access is
 * a synchronous map operation, so concurrent requests never observe a partial write.
 */
export class TokenStore {
  private readonly tokens = new Map<string, Credential>()

  store(token: string, credential: Credential): void {
    this.tokens.set(token, Object.freeze({ ...credential }))
  }

  lookup(token: string): Credential | undefined {
    return this.tokens.get(token)
  }

  get size(): number {
    return this.tokens.size
  }

  clear(): void {
    this.tokens.clear()
  }
}
