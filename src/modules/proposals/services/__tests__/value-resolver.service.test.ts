import { describe, it, expect, beforeEach } from 'vitest'
import pino from 'pino'
import { MemoryProposalStore } from '../../../../testing/memory-proposal-store'
import { proposalOwner } from '../../../../types/proposal.types'
import { NotFoundError, ValidationError } from '../../../../utils/errors'
import { TemplateCloningService } from '../template-cloning.service'
import { ValueResolverService } from '../value-resolver.service'

const logger = pino({ level: 'silent' })

describe('ValueResolverService', () => {
  let store: MemoryProposalStore
  let values: ValueResolverService
  let proposalId: number

  beforeEach(async () => {
    store = new MemoryProposalStore()
    values = new ValueResolverService(store, logger)
    const cloning = new TemplateCloningService(store, logger)
    proposalId = (await cloning.createProposalFromScratch({ name: 'Deck', globalMarkupPercentage: 0 })).id
  })

  describe('setVariableValues', () => {
    it('should create a proposal variable inline', async () => {
      const result = await values.setVariableValues(proposalId, [
        { variable: { kind: 'new', name: 'Width', type: 'LINEAR_FEET' }, value: 12 },
      ])

      expect(result).toEqual([{ variableId: 2, variableName: 'Width', variableType: 'LINEAR_FEET', value: 12 }])
      expect(await store.listVariables(proposalOwner(proposalId))).toEqual([
        { id: 2, owner: { kind: 'proposal', proposalId: 1 }, name: 'Width', type: 'LINEAR_FEET', defaultValue: 12 },
      ])
    })

    it('should overwrite the value of an existing variable', async () => {
      await values.setVariableValues(proposalId, [
        { variable: { kind: 'new', name: 'Width', type: 'LINEAR_FEET' }, value: 12 },
      ])

      const result = await values.setVariableValues(proposalId, [
        { variable: { kind: 'existing', variableId: 2 }, value: 15 },
      ])

      expect(result).toEqual([{ variableId: 2, variableName: 'Width', variableType: 'LINEAR_FEET', value: 15 }])
      expect(await values.getVariableValues(proposalId)).toEqual([
        { variableId: 2, variableName: 'Width', variableType: 'LINEAR_FEET', value: 15 },
      ])
    })

    it('should fail with NotFound for an unknown variable', async () => {
      await expect(values.setVariableValues(proposalId, [
        { variable: { kind: 'existing', variableId: 99 }, value: 1 },
      ])).rejects.toThrow('Variable with ID 99 not found')
    })

    it('should apply nothing when one item fails', async () => {
      await expect(values.setVariableValues(proposalId, [
        { variable: { kind: 'new', name: 'Height', type: 'LINEAR_FEET' }, value: 8 },
        { variable: { kind: 'existing', variableId: 99 }, value: 1 },
      ])).rejects.toBeInstanceOf(NotFoundError)

      expect(await store.listVariables(proposalOwner(proposalId))).toEqual([])
      expect(await values.getVariableValues(proposalId)).toEqual([])
    })

    it('should reject a new variable without a name', async () => {
      const attempt = values.setVariableValues(proposalId, [
        { variable: { kind: 'new', name: '  ', type: 'COUNT' }, value: 1 },
      ])

      await expect(attempt).rejects.toBeInstanceOf(ValidationError)
      await expect(attempt).rejects.toThrow('variable_name and variable_type are required')
    })

    it('should fail with NotFound for an unknown proposal', async () => {
      await expect(values.setVariableValues(42, [])).rejects.toThrow('Proposal with ID 42 not found')
    })
  })

  describe('updateElementValues', () => {
    it('should create an element and its category inline', async () => {
      const result = await values.updateElementValues(proposalId, [
        {
          element: { kind: 'new', name: 'Railing' },
          categoryName: 'Carpentry',
          categoryPosition: 2,
          position: 1,
          calculatedMaterialCost: 100,
          calculatedLaborCost: 50,
          markupPercentage: 20,
        },
      ])

      expect(result).toEqual([
        {
          elementId: 3,
          elementName: 'Railing',
          categoryId: 2,
          categoryName: 'Carpentry',
          position: 1,
          calculatedMaterialCost: 100,
          calculatedLaborCost: 50,
          markupPercentage: 20,
          totalCost: 150,
          totalWithMarkup: 180,
        },
      ])
      expect(await store.listCategories(proposalOwner(proposalId))).toEqual([
        { id: 2, owner: { kind: 'proposal', proposalId: 1 }, name: 'Carpentry', position: 2 },
      ])
      // costs live on the value row, the element keeps placeholders
      expect(await store.getElement(3)).toMatchObject({ materialCost: '0', laborCost: '0', markupPercentage: 20 })
    })

    it('should reuse a category by name within the batch', async () => {
      await values.updateElementValues(proposalId, [
        { element: { kind: 'new', name: 'Posts' }, categoryName: 'Framing', calculatedMaterialCost: 10, calculatedLaborCost: 0, markupPercentage: 0 },
        { element: { kind: 'new', name: 'Joists' }, categoryName: 'Framing', calculatedMaterialCost: 20, calculatedLaborCost: 0, markupPercentage: 0 },
      ])

      const categories = await store.listCategories(proposalOwner(proposalId))
      expect(categories.map(c => c.name)).toEqual(['Framing'])
      expect((await values.getElementValues(proposalId)).map(v => v.categoryId)).toEqual([2, 2])
    })

    it('should leave elements without a category name uncategorised', async () => {
      const [result] = await values.updateElementValues(proposalId, [
        { element: { kind: 'new', name: 'Permit' }, calculatedMaterialCost: 0, calculatedLaborCost: 75, markupPercentage: 0 },
      ])

      expect(result.categoryId).toBeNull()
      expect(result.categoryName).toBeNull()
      expect(result.totalCost).toBe(75)
    })

    it('should keep sub-cent precision in the marked-up total', async () => {
      const [result] = await values.updateElementValues(proposalId, [
        { element: { kind: 'new', name: 'Trim' }, calculatedMaterialCost: 100.01, calculatedLaborCost: 0, markupPercentage: 12.5 },
      ])

      expect(result.totalCost).toBe(100.01)
      expect(result.totalWithMarkup).toBe(112.51125)
    })

    it('should rename and move an existing element', async () => {
      await values.updateElementValues(proposalId, [
        { element: { kind: 'new', name: 'Railing' }, categoryName: 'Carpentry', calculatedMaterialCost: 100, calculatedLaborCost: 50, markupPercentage: 0 },
      ])

      const [moved] = await values.updateElementValues(proposalId, [
        {
          element: { kind: 'existing', elementId: 3 },
          name: 'Handrail',
          categoryName: 'Finish',
          calculatedMaterialCost: 10,
          calculatedLaborCost: 5,
          markupPercentage: 0,
        },
      ])

      expect(moved).toEqual({
        elementId: 3,
        elementName: 'Handrail',
        categoryId: 4,
        categoryName: 'Finish',
        position: 0,
        calculatedMaterialCost: 10,
        calculatedLaborCost: 5,
        markupPercentage: 0,
        totalCost: 15,
        totalWithMarkup: 15,
      })
      // the value row is replaced, not duplicated
      expect(await values.getElementValues(proposalId)).toEqual([moved])
    })

    it('should keep the category when the name is unchanged', async () => {
      await values.updateElementValues(proposalId, [
        { element: { kind: 'new', name: 'Railing' }, categoryName: 'Carpentry', calculatedMaterialCost: 100, calculatedLaborCost: 50, markupPercentage: 0 },
      ])

      const [updated] = await values.updateElementValues(proposalId, [
        { element: { kind: 'existing', elementId: 3 }, categoryName: 'Carpentry', calculatedMaterialCost: 1, calculatedLaborCost: 2, markupPercentage: 50 },
      ])

      expect(updated.categoryId).toBe(2)
      expect(updated.totalWithMarkup).toBe(4.5)
      expect((await store.listCategories(proposalOwner(proposalId))).length).toBe(1)
    })

    it('should fail with NotFound for an unknown element', async () => {
      await expect(values.updateElementValues(proposalId, [
        { element: { kind: 'existing', elementId: 99 }, calculatedMaterialCost: 1, calculatedLaborCost: 1, markupPercentage: 0 },
      ])).rejects.toThrow('Element with ID 99 not found')
    })

    it('should reject a new element without a name', async () => {
      await expect(values.updateElementValues(proposalId, [
        { element: { kind: 'new', name: '' }, calculatedMaterialCost: 1, calculatedLaborCost: 1, markupPercentage: 0 },
      ])).rejects.toThrow('element_name is required')
    })
  })
})
