import { describe, it, expect, vi } from 'vitest'
import { withRetry } from '../retry'
import { isTransientDatabaseError } from '../database-error-handler'

const serializationFailure = () => Object.assign(new Error('could not serialize access'), { code: '40001' })

describe('retry.ts', () => {
  it('should replay transient failures with exponential backoff', async () => {
    const sleep = vi.fn(async () => {})
    const onRetry = vi.fn()
    const work = vi.fn()
      .mockRejectedValueOnce(serializationFailure())
      .mockRejectedValueOnce(serializationFailure())
      .mockResolvedValueOnce('ok')

    const result = await withRetry(work, {
      attempts: 3,
      baseDelayMs: 50,
      factor: 2,
      shouldRetry: isTransientDatabaseError,
      onRetry,
      sleep,
    })

    expect(result).toBe('ok')
    expect(work).toHaveBeenCalledTimes(3)
    expect(sleep.mock.calls).toEqual([[50], [100]])
    expect(onRetry.mock.calls.map(call => [call[1], call[2]])).toEqual([[1, 50], [2, 100]])
  })

  it('should rethrow the last error once attempts are exhausted', async () => {
    const sleep = vi.fn(async () => {})
    const work = vi.fn(async () => {
      throw serializationFailure()
    })

    await expect(withRetry(work, {
      attempts: 3,
      baseDelayMs: 50,
      factor: 2,
      shouldRetry: isTransientDatabaseError,
      sleep,
    })).rejects.toThrow('could not serialize access')

    expect(work).toHaveBeenCalledTimes(3)
    expect(sleep).toHaveBeenCalledTimes(2)
  })

  it('should not retry errors the predicate rejects', async () => {
    const sleep = vi.fn(async () => {})
    const work = vi.fn(async () => {
      throw Object.assign(new Error('duplicate key'), { code: '23505' })
    })

    await expect(withRetry(work, {
      attempts: 3,
      baseDelayMs: 50,
      factor: 2,
      shouldRetry: isTransientDatabaseError,
      sleep,
    })).rejects.toThrow('duplicate key')

    expect(work).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })
})
