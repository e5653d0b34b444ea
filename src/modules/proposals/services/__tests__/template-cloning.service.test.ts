/**
 * Cloning a template into a proposal, against the in-memory store.
 * Ids come from one sequence shared by every entity, starting at 1.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import pino from 'pino'
import { MemoryProposalStore } from '../../../../testing/memory-proposal-store'
import { proposalOwner, templateOwner } from '../../../../types/proposal.types'
import { NotFoundError } from '../../../../utils/errors'
import { TemplateCatalogService } from '../../../templates/services/template-catalog.service'
import { TemplateCloningService } from '../template-cloning.service'
import { ValueResolverService } from '../value-resolver.service'

const logger = pino({ level: 'silent' })
const createdAt = new Date('2026-01-05T10:00:00.000Z')

describe('TemplateCloningService', () => {
  let store: MemoryProposalStore
  let catalog: TemplateCatalogService
  let cloning: TemplateCloningService
  let values: ValueResolverService

  beforeEach(() => {
    store = new MemoryProposalStore(() => createdAt)
    catalog = new TemplateCatalogService(store, logger)
    cloning = new TemplateCloningService(store, logger)
    values = new ValueResolverService(store, logger)
  })

  // template 1, variable 2, category 3, element 4
  async function seedKitchen() {
    const template = await catalog.createTemplate({ name: 'Kitchen', description: 'Standard kitchen' })
    await catalog.createVariable(template.id, { name: 'Width', type: 'LINEAR_FEET', defaultValue: 10 })
    const flooring = await catalog.createCategory(template.id, { name: 'Flooring', position: 0 })
    await catalog.createElement(flooring.id, {
      name: 'Tile',
      materialCost: '500',
      laborCost: '200',
      markupPercentage: 10,
      position: 0,
    })
    return template
  }

  it('should link the new proposal to its template', async () => {
    const template = await seedKitchen()

    const proposal = await cloning.instantiateProposalFromTemplate({
      templateId: template.id,
      name: 'Smith kitchen',
      globalMarkupPercentage: 5,
    })

    expect(proposal).toEqual({
      id: 5,
      name: 'Smith kitchen',
      templateId: 1,
      globalMarkupPercentage: 5,
      createdAt,
    })
  })

  it('should copy categories and elements with computed costs', async () => {
    const template = await seedKitchen()
    const proposal = await cloning.instantiateProposalFromTemplate({
      templateId: template.id,
      name: 'Smith kitchen',
      globalMarkupPercentage: 0,
    })

    expect(await store.listCategories(proposalOwner(proposal.id))).toEqual([
      { id: 6, owner: { kind: 'proposal', proposalId: 5 }, name: 'Flooring', position: 0 },
    ])
    expect(await store.listElements(proposalOwner(proposal.id))).toEqual([
      {
        id: 7,
        owner: { kind: 'proposal', proposalId: 5 },
        categoryId: 6,
        name: 'Tile',
        materialCost: '500',
        laborCost: '200',
        markupPercentage: 10,
        position: 0,
      },
    ])
    expect(await values.getElementValues(proposal.id)).toEqual([
      {
        elementId: 7,
        elementName: 'Tile',
        categoryId: 6,
        categoryName: 'Flooring',
        position: 0,
        calculatedMaterialCost: 500,
        calculatedLaborCost: 200,
        markupPercentage: 10,
        totalCost: 700,
        totalWithMarkup: 770,
      },
    ])
  })

  it('should seed variable values from template defaults', async () => {
    const template = await seedKitchen()
    const proposal = await cloning.instantiateProposalFromTemplate({
      templateId: template.id,
      name: 'Smith kitchen',
      globalMarkupPercentage: 0,
    })

    expect(await values.getVariableValues(proposal.id)).toEqual([
      { variableId: 2, variableName: 'Width', variableType: 'LINEAR_FEET', value: 10 },
    ])
    // the variable itself stays template-owned
    expect(await store.listVariables(proposalOwner(proposal.id))).toEqual([])
  })

  it('should leave the template structure untouched', async () => {
    const template = await seedKitchen()
    await cloning.instantiateProposalFromTemplate({ templateId: template.id, name: 'A', globalMarkupPercentage: 0 })
    await cloning.instantiateProposalFromTemplate({ templateId: template.id, name: 'B', globalMarkupPercentage: 0 })

    expect((await store.listCategories(templateOwner(template.id))).map(c => c.id)).toEqual([3])
    expect((await store.listElements(templateOwner(template.id))).map(e => e.id)).toEqual([4])
  })

  it('should value formula costs at zero', async () => {
    const template = await catalog.createTemplate({ name: 'Deck', description: '' })
    const boards = await catalog.createCategory(template.id, { name: 'Boards', position: 0 })
    await catalog.createElement(boards.id, {
      name: 'Planks',
      materialCost: 'width * 12',
      laborCost: '150.25',
      markupPercentage: 0,
      position: 0,
    })

    const proposal = await cloning.instantiateProposalFromTemplate({
      templateId: template.id,
      name: 'Deck job',
      globalMarkupPercentage: 0,
    })

    const [planks] = await values.getElementValues(proposal.id)
    expect(planks.calculatedMaterialCost).toBe(0)
    expect(planks.calculatedLaborCost).toBe(150.25)
    expect(planks.totalCost).toBe(150.25)
  })

  it('should clone categories and elements in position order', async () => {
    const template = await catalog.createTemplate({ name: 'Bath', description: '' })
    const finish = await catalog.createCategory(template.id, { name: 'Finish', position: 2 })
    const rough = await catalog.createCategory(template.id, { name: 'Rough-in', position: 1 })
    await catalog.createElement(rough.id, { name: 'Drain', materialCost: '40', laborCost: '60', markupPercentage: 0, position: 1 })
    await catalog.createElement(rough.id, { name: 'Supply', materialCost: '30', laborCost: '70', markupPercentage: 0, position: 0 })
    await catalog.createElement(finish.id, { name: 'Paint', materialCost: '20', laborCost: '80', markupPercentage: 0, position: 0 })

    const proposal = await cloning.instantiateProposalFromTemplate({
      templateId: template.id,
      name: 'Bath job',
      globalMarkupPercentage: 0,
    })

    const cloned = await values.getElementValues(proposal.id)
    expect(cloned.map(v => [v.categoryName, v.elementName])).toEqual([
      ['Rough-in', 'Supply'],
      ['Rough-in', 'Drain'],
      ['Finish', 'Paint'],
    ])
  })

  it('should fail with NotFound for an unknown template', async () => {
    const attempt = cloning.instantiateProposalFromTemplate({ templateId: 99, name: 'X', globalMarkupPercentage: 0 })

    await expect(attempt).rejects.toBeInstanceOf(NotFoundError)
    await expect(attempt).rejects.toThrow('Template with ID 99 not found')
    expect(await store.listProposals()).toEqual([])
  })

  it('should keep nothing when a step fails midway', async () => {
    const template = await seedKitchen()
    vi.spyOn(store, 'upsertElementValue').mockRejectedValueOnce(new Error('disk full'))

    await expect(cloning.instantiateProposalFromTemplate({
      templateId: template.id,
      name: 'Smith kitchen',
      globalMarkupPercentage: 0,
    })).rejects.toThrow('disk full')

    expect(await store.listProposals()).toEqual([])
    expect(await store.listCategories(proposalOwner(5))).toEqual([])
    expect(await store.listElements(proposalOwner(5))).toEqual([])
  })

  it('should create an empty proposal from scratch', async () => {
    const proposal = await cloning.createProposalFromScratch({ name: 'Garage', globalMarkupPercentage: 12.5 })

    expect(proposal).toEqual({ id: 1, name: 'Garage', templateId: null, globalMarkupPercentage: 12.5, createdAt })
    expect(await values.getElementValues(proposal.id)).toEqual([])
  })
})
