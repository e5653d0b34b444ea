import { describe, it, expect, vi, beforeEach } from 'vitest'
import pino from 'pino'
import { MemoryProposalStore } from '../../../../testing/memory-proposal-store'
import { proposalOwner } from '../../../../types/proposal.types'
import { NotFoundError, ValidationError } from '../../../../utils/errors'
import { TemplateCatalogService } from '../../../templates/services/template-catalog.service'
import { TemplateCloningService } from '../template-cloning.service'
import { TemplateSyncService } from '../template-sync.service'
import { ValueResolverService } from '../value-resolver.service'

const logger = pino({ level: 'silent' })
const noChanges = { addedVariables: [], updatedVariables: [], addedElements: [] }

describe('TemplateSyncService', () => {
  let store: MemoryProposalStore
  let catalog: TemplateCatalogService
  let cloning: TemplateCloningService
  let values: ValueResolverService
  let sync: TemplateSyncService

  beforeEach(() => {
    store = new MemoryProposalStore()
    catalog = new TemplateCatalogService(store, logger)
    cloning = new TemplateCloningService(store, logger)
    values = new ValueResolverService(store, logger)
    sync = new TemplateSyncService(store, logger)
  })

  // template 1, variables 2-3, category 4, element 5; proposal 6, category 7, element 8
  async function seedBathroom() {
    const template = await catalog.createTemplate({ name: 'Bathroom', description: '' })
    await catalog.createVariable(template.id, { name: 'Width', type: 'LINEAR_FEET', defaultValue: 10 })
    await catalog.createVariable(template.id, { name: 'Height', type: 'LINEAR_FEET', defaultValue: 8 })
    const tiles = await catalog.createCategory(template.id, { name: 'Tiles', position: 0 })
    await catalog.createElement(tiles.id, { name: 'Floor tile', materialCost: '300', laborCost: '100', markupPercentage: 10, position: 0 })
    const proposal = await cloning.instantiateProposalFromTemplate({
      templateId: template.id,
      name: 'Jones bathroom',
      globalMarkupPercentage: 0,
    })
    return { template, tiles, proposal }
  }

  // variable 9, element 10, category 11, element 12
  async function changeTemplate(templateId: number, tilesId: number) {
    await catalog.createVariable(templateId, { name: 'Depth', type: 'LINEAR_FEET', defaultValue: 3 })
    await catalog.createElement(tilesId, { name: 'Wall tile', materialCost: '250', laborCost: '150', markupPercentage: 0, position: 1 })
    const fixtures = await catalog.createCategory(templateId, { name: 'Fixtures', position: 1 })
    await catalog.createElement(fixtures.id, { name: 'Sink', materialCost: '400', laborCost: '50', markupPercentage: 5, position: 0 })
  }

  it('should report no changes right after cloning', async () => {
    const { proposal } = await seedBathroom()

    expect(await sync.syncProposalWithTemplate(proposal.id)).toEqual(noChanges)
  })

  it('should pull new variables, categories and elements and reset edited values', async () => {
    const { template, tiles, proposal } = await seedBathroom()
    await values.setVariableValues(proposal.id, [{ variable: { kind: 'existing', variableId: 2 }, value: 12 }])
    await changeTemplate(template.id, tiles.id)

    const result = await sync.syncProposalWithTemplate(proposal.id)

    expect(result).toEqual({
      addedVariables: ['Depth'],
      updatedVariables: ['Width'],
      addedElements: ['Wall tile', 'Sink'],
    })
    expect((await values.getVariableValues(proposal.id)).map(v => [v.variableName, v.value])).toEqual([
      ['Width', 10],
      ['Height', 8],
      ['Depth', 3],
    ])
    expect((await values.getElementValues(proposal.id)).map(v => [v.categoryName, v.elementName, v.totalWithMarkup])).toEqual([
      ['Tiles', 'Floor tile', 440],
      ['Tiles', 'Wall tile', 400],
      ['Fixtures', 'Sink', 472.5],
    ])
  })

  it('should be idempotent', async () => {
    const { template, tiles, proposal } = await seedBathroom()
    await changeTemplate(template.id, tiles.id)

    await sync.syncProposalWithTemplate(proposal.id)

    expect(await sync.syncProposalWithTemplate(proposal.id)).toEqual(noChanges)
  })

  it('should never touch elements the proposal already has', async () => {
    const { proposal } = await seedBathroom()
    await values.updateElementValues(proposal.id, [
      { element: { kind: 'existing', elementId: 8 }, calculatedMaterialCost: 999, calculatedLaborCost: 1, markupPercentage: 0 },
    ])

    await sync.syncProposalWithTemplate(proposal.id)

    const [floorTile] = await values.getElementValues(proposal.id)
    expect(floorTile.totalCost).toBe(1000)
  })

  it('should skip a failing element and keep the rest of the sync', async () => {
    const { template, tiles, proposal } = await seedBathroom()
    await changeTemplate(template.id, tiles.id)
    const createElement = store.createElement.bind(store)
    vi.spyOn(store, 'createElement').mockImplementation(async input => {
      if (input.name === 'Sink') throw new Error('constraint failed')
      return createElement(input)
    })

    const result = await sync.syncProposalWithTemplate(proposal.id)

    expect(result).toEqual({ addedVariables: ['Depth'], updatedVariables: [], addedElements: ['Wall tile'] })
    expect((await store.listCategories(proposalOwner(proposal.id))).map(c => c.name)).toEqual(['Tiles', 'Fixtures'])
    expect((await store.listElements(proposalOwner(proposal.id))).map(e => e.name)).toEqual(['Floor tile', 'Wall tile'])
  })

  it('should reject a proposal without a template', async () => {
    const proposal = await cloning.createProposalFromScratch({ name: 'Ad hoc', globalMarkupPercentage: 0 })
    const attempt = sync.syncProposalWithTemplate(proposal.id)

    await expect(attempt).rejects.toBeInstanceOf(ValidationError)
    await expect(attempt).rejects.toThrow('Proposal has no associated template')
  })

  it('should reject a proposal whose template was deleted', async () => {
    const { template, proposal } = await seedBathroom()
    await catalog.deleteTemplate(template.id)

    await expect(sync.syncProposalWithTemplate(proposal.id)).rejects.toThrow('Proposal has no associated template')
  })

  it('should fail with NotFound for an unknown proposal', async () => {
    await expect(sync.syncProposalWithTemplate(404)).rejects.toBeInstanceOf(NotFoundError)
  })
})
