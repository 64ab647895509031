import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'

import type { ServiceAccount } from '../../src/credentials/schema.js'
import type { Post, ThreadsPost } from '../../src/schema/post.js'

export function makePost(overrides: Partial<Post> = {}): Post {
  return {
    postId: 'post-1',
    shortcode: 'SC1',
    postDate: '2024-05-01T20:00:00+0800',
    content: 'hello threads',
    isQuote: false,
    mediaType: 'TEXT_POST',
    permalink: 'https://www.threads.net/@tester/post/SC1',
    views: 0,
    likes: 0,
    replies: 0,
    reposts: 0,
    quotes: 0,
    shares: 0,
    ...overrides,
  }
}

export function makeThreadsPost(
  id: string,
  timestamp: string,
  overrides: Partial<ThreadsPost> = {},
): ThreadsPost {
  return {
    id,
    shortcode: `SC-${id}`,
    timestamp,
    text: `text of ${id}`,
    is_quote_post: false,
    media_type: 'TEXT_POST',
    permalink: `https://www.threads.net/@tester/post/SC-${id}`,
    ...overrides,
  }
}

export function makeServiceAccount(overrides: Partial<ServiceAccount> = {}): ServiceAccount {
  return {
    type: 'service_account',
    project_id: 'test-project',
    private_key_id: 'test-key-id',
    private_key: 'test-private-key',
    client_email: 'exporter@test-project.iam.gserviceaccount.com',
    ...overrides,
  }
}

/**
 * Fresh temp directory plus a cleanup function
 */
export async function makeTempDir(
  prefix = 'threads-export-test-',
): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(tmpdir(), prefix))
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) }
}
