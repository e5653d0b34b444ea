import { describe, it, expect } from 'vitest'
import { currentVersion, planPromotion } from '../contract-versioning'

describe('contract-versioning.ts', () => {
  it('should start a fresh history at version 1', () => {
    expect(planPromotion([])).toEqual({ version: 1, demote: [] })
    expect(currentVersion([])).toBeUndefined()
  })

  it('should promote past the highest version and demote the current one', () => {
    const history = [
      { id: 4, version: 1, isActive: false },
      { id: 7, version: 2, isActive: true },
    ]

    expect(planPromotion(history)).toEqual({ version: 3, demote: [7] })
    expect(currentVersion(history)).toEqual({ id: 7, version: 2, isActive: true })
  })

  it('should number after gaps left by deleted versions', () => {
    const history = [
      { id: 2, version: 1, isActive: false },
      { id: 9, version: 4, isActive: false },
    ]

    expect(planPromotion(history)).toEqual({ version: 5, demote: [] })
    expect(currentVersion(history)).toBeUndefined()
  })
})
