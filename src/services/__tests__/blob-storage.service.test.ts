import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { StorageError } from '../../utils/errors'
import { LocalBlobStore } from '../blob-storage.service'

describe('LocalBlobStore', () => {
  let root: string
  let blobs: LocalBlobStore

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'blob-store-'))
    blobs = new LocalBlobStore(root)
  })

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true })
  })

  it('should save under the hinted directory with a unique suffix', async () => {
    const stored = await blobs.save('signatures/contract-1-client.png', Buffer.from('png-bytes'))

    expect(stored).toMatch(/^signatures\/contract-1-client_[0-9a-f]{8}\.png$/)
    expect(await fs.readFile(path.join(root, stored), 'utf8')).toBe('png-bytes')
  })

  it('should never overwrite an earlier blob with the same hint', async () => {
    const first = await blobs.save('signatures/contract-1-client.png', Buffer.from('one'))
    const second = await blobs.save('signatures/contract-1-client.png', Buffer.from('two'))

    expect(second).not.toBe(first)
    expect(await fs.readFile(path.join(root, first), 'utf8')).toBe('one')
  })

  it('should keep hints that climb out of the root inside it', async () => {
    const stored = await blobs.save('../../etc/passwd', Buffer.from('x'))

    expect(stored).toMatch(/^etc\/passwd_[0-9a-f]{8}$/)
  })

  it('should delete a stored blob', async () => {
    const stored = await blobs.save('signatures/contract-2-contractor.png', Buffer.from('x'))

    await blobs.delete(stored)

    await expect(fs.access(path.join(root, stored))).rejects.toThrow()
  })

  it('should refuse to delete outside the root', async () => {
    await expect(blobs.delete('../outside.png')).rejects.toBeInstanceOf(StorageError)
  })

  it('should report a missing blob as a storage error', async () => {
    await expect(blobs.delete('signatures/missing.png')).rejects.toThrow('Failed to delete blob signatures/missing.png')
  })
})
