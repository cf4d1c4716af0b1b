import type { ClientConfig } from "./config/schema"
import { LoungeClient } from "./core/lounge-client"
import { createLoungeClient } from "./create"

/**
 * Opens a client, runs `fn` with it and closes it afterwards, whether `fn`
 * resolved or threw. Given a config, the client is created first.
 */
export async function withLoungeClient<R>(
  source: LoungeClient | ClientConfig,
  fn: (client: LoungeClient) => Promise<R>,
): Promise<R> {
  const client = source instanceof LoungeClient ? source : createLoungeClient(source)

  try {
    await client.open()

    return await fn(client)
  } finally {
    await client.close()
  }
}
