/**
 * Anything holding a session that must be released
 */
export interface Closeable {
  close(): void | Promise<void>;
}

/**
 * Run `fn` with the client and close the client afterwards, whether `fn`
 * resolves or rejects
 */
export async function withClient<C extends Closeable, T>(
  client: C,
  fn: (client: C) => Promise<T>
): Promise<T> {
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
