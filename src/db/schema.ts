import { pgTable, index, foreignKey, check, text, timestamp, integer, uniqueIndex, varchar, serial, numeric, pgEnum } from "drizzle-orm/pg-core"
import { sql, relations } from "drizzle-orm"

// Enums
export const variableType = pgEnum("VariableType", ['LINEAR_FEET', 'SQUARE_FEET', 'CUBIC_FEET', 'COUNT'])


// ============================================================================
// TEMPLATES
// ============================================================================

export const templates = pgTable("templates", {
  id: serial("id").primaryKey().notNull(),
  name: varchar("name", { length: 255 }).notNull(),
  description: text("description").default('').notNull(),
  createdAt: timestamp("created_at", { precision: 3, withTimezone: true }).defaultNow().notNull(),
});

// ============================================================================
// PROPOSALS
// ============================================================================

/**
 * Proposals
 * A proposal survives the deletion of the template it was cloned from
 * (template_id is set to NULL).
 */
export const proposals = pgTable("proposals", {
  id: serial("id").primaryKey().notNull(),
  name: varchar("name", { length: 255 }).notNull(),
  templateId: integer("template_id"),
  globalMarkupPercentage: numeric("global_markup_percentage", { precision: 5, scale: 2 }).default('0').notNull(),
  createdAt: timestamp("created_at", { precision: 3, withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("proposals_template_id_idx").using("btree", table.templateId.asc().nullsLast().op("int4_ops")),
  foreignKey({
    columns: [table.templateId],
    foreignColumns: [templates.id],
    name: "proposals_template_id_fkey"
  }).onUpdate("cascade").onDelete("set null"),
]);

// ============================================================================
// CATEGORIES / VARIABLES / ELEMENTS
// Owned by exactly one template OR one proposal (enforced by CHECK).
// ============================================================================

export const proposalCategories = pgTable("proposal_categories", {
  id: serial("id").primaryKey().notNull(),
  name: varchar("name", { length: 255 }).notNull(),
  templateId: integer("template_id"),
  proposalId: integer("proposal_id"),
  position: integer("position").default(0).notNull(),
}, (table) => [
  index("proposal_categories_template_id_idx").using("btree", table.templateId.asc().nullsLast().op("int4_ops")),
  index("proposal_categories_proposal_id_idx").using("btree", table.proposalId.asc().nullsLast().op("int4_ops")),
  check("proposal_categories_single_owner", sql`(${table.templateId} IS NULL) <> (${table.proposalId} IS NULL)`),
  foreignKey({
    columns: [table.templateId],
    foreignColumns: [templates.id],
    name: "proposal_categories_template_id_fkey"
  }).onUpdate("cascade").onDelete("cascade"),
  foreignKey({
    columns: [table.proposalId],
    foreignColumns: [proposals.id],
    name: "proposal_categories_proposal_id_fkey"
  }).onUpdate("cascade").onDelete("cascade"),
]);

export const proposalVariables = pgTable("proposal_variables", {
  id: serial("id").primaryKey().notNull(),
  name: varchar("name", { length: 255 }).notNull(),
  type: variableType("type").notNull(),
  defaultValue: numeric("default_value", { precision: 10, scale: 2 }).default('0').notNull(),
  templateId: integer("template_id"),
  proposalId: integer("proposal_id"),
}, (table) => [
  index("proposal_variables_template_id_idx").using("btree", table.templateId.asc().nullsLast().op("int4_ops")),
  index("proposal_variables_proposal_id_idx").using("btree", table.proposalId.asc().nullsLast().op("int4_ops")),
  check("proposal_variables_single_owner", sql`(${table.templateId} IS NULL) <> (${table.proposalId} IS NULL)`),
  foreignKey({
    columns: [table.templateId],
    foreignColumns: [templates.id],
    name: "proposal_variables_template_id_fkey"
  }).onUpdate("cascade").onDelete("cascade"),
  foreignKey({
    columns: [table.proposalId],
    foreignColumns: [proposals.id],
    name: "proposal_variables_proposal_id_fkey"
  }).onUpdate("cascade").onDelete("cascade"),
]);

/**
 * Elements
 * material_cost / labor_cost hold "formula or fixed value" text; only literal
 * decimals are ever interpreted.
 */
export const proposalElements = pgTable("proposal_elements", {
  id: serial("id").primaryKey().notNull(),
  name: varchar("name", { length: 255 }).notNull(),
  categoryId: integer("category_id"),
  materialCost: varchar("material_cost", { length: 255 }).notNull(),
  laborCost: varchar("labor_cost", { length: 255 }).notNull(),
  markupPercentage: numeric("markup_percentage", { precision: 5, scale: 2 }).default('0').notNull(),
  position: integer("position").default(0).notNull(),
  templateId: integer("template_id"),
  proposalId: integer("proposal_id"),
}, (table) => [
  index("proposal_elements_category_id_idx").using("btree", table.categoryId.asc().nullsLast().op("int4_ops")),
  index("proposal_elements_proposal_id_idx").using("btree", table.proposalId.asc().nullsLast().op("int4_ops")),
  check("proposal_elements_single_owner", sql`(${table.templateId} IS NULL) <> (${table.proposalId} IS NULL)`),
  foreignKey({
    columns: [table.categoryId],
    foreignColumns: [proposalCategories.id],
    name: "proposal_elements_category_id_fkey"
  }).onUpdate("cascade").onDelete("cascade"),
  foreignKey({
    columns: [table.templateId],
    foreignColumns: [templates.id],
    name: "proposal_elements_template_id_fkey"
  }).onUpdate("cascade").onDelete("cascade"),
  foreignKey({
    columns: [table.proposalId],
    foreignColumns: [proposals.id],
    name: "proposal_elements_proposal_id_fkey"
  }).onUpdate("cascade").onDelete("cascade"),
]);

// ============================================================================
// PROPOSAL VALUES
// ============================================================================

export const proposalVariableValues = pgTable("proposal_variable_values", {
  id: serial("id").primaryKey().notNull(),
  proposalId: integer("proposal_id").notNull(),
  variableId: integer("variable_id").notNull(),
  value: numeric("value", { precision: 10, scale: 2 }).notNull(),
}, (table) => [
  uniqueIndex("proposal_variable_values_proposal_variable_key").using("btree", table.proposalId.asc().nullsLast().op("int4_ops"), table.variableId.asc().nullsLast().op("int4_ops")),
  foreignKey({
    columns: [table.proposalId],
    foreignColumns: [proposals.id],
    name: "proposal_variable_values_proposal_id_fkey"
  }).onUpdate("cascade").onDelete("cascade"),
  foreignKey({
    columns: [table.variableId],
    foreignColumns: [proposalVariables.id],
    name: "proposal_variable_values_variable_id_fkey"
  }).onUpdate("cascade").onDelete("cascade"),
]);

export const proposalElementValues = pgTable("proposal_element_values", {
  id: serial("id").primaryKey().notNull(),
  proposalId: integer("proposal_id").notNull(),
  elementId: integer("element_id").notNull(),
  calculatedMaterialCost: numeric("calculated_material_cost", { precision: 10, scale: 2 }).notNull(),
  calculatedLaborCost: numeric("calculated_labor_cost", { precision: 10, scale: 2 }).notNull(),
  markupPercentage: numeric("markup_percentage", { precision: 5, scale: 2 }).default('0').notNull(),
}, (table) => [
  uniqueIndex("proposal_element_values_proposal_element_key").using("btree", table.proposalId.asc().nullsLast().op("int4_ops"), table.elementId.asc().nullsLast().op("int4_ops")),
  foreignKey({
    columns: [table.proposalId],
    foreignColumns: [proposals.id],
    name: "proposal_element_values_proposal_id_fkey"
  }).onUpdate("cascade").onDelete("cascade"),
  foreignKey({
    columns: [table.elementId],
    foreignColumns: [proposalElements.id],
    name: "proposal_element_values_element_id_fkey"
  }).onUpdate("cascade").onDelete("cascade"),
]);

// ============================================================================
// RELATIONS
// ============================================================================

export const templatesRelations = relations(templates, ({ many }) => ({
  proposals: many(proposals),
  categories: many(proposalCategories),
  variables: many(proposalVariables),
  elements: many(proposalElements),
}));

export const proposalsRelations = relations(proposals, ({ one, many }) => ({
  template: one(templates, {
    fields: [proposals.templateId],
    references: [templates.id]
  }),
  directCategories: many(proposalCategories),
  directVariables: many(proposalVariables),
  directElements: many(proposalElements),
  variableValues: many(proposalVariableValues),
  elementValues: many(proposalElementValues),
}));

export const proposalCategoriesRelations = relations(proposalCategories, ({ one, many }) => ({
  template: one(templates, {
    fields: [proposalCategories.templateId],
    references: [templates.id]
  }),
  proposal: one(proposals, {
    fields: [proposalCategories.proposalId],
    references: [proposals.id]
  }),
  elements: many(proposalElements),
}));

export const proposalVariablesRelations = relations(proposalVariables, ({ one, many }) => ({
  template: one(templates, {
    fields: [proposalVariables.templateId],
    references: [templates.id]
  }),
  proposal: one(proposals, {
    fields: [proposalVariables.proposalId],
    references: [proposals.id]
  }),
  values: many(proposalVariableValues),
}));

export const proposalElementsRelations = relations(proposalElements, ({ one, many }) => ({
  category: one(proposalCategories, {
    fields: [proposalElements.categoryId],
    references: [proposalCategories.id]
  }),
  template: one(templates, {
    fields: [proposalElements.templateId],
    references: [templates.id]
  }),
  proposal: one(proposals, {
    fields: [proposalElements.proposalId],
    references: [proposals.id]
  }),
  values: many(proposalElementValues),
}));

export const proposalVariableValuesRelations = relations(proposalVariableValues, ({ one }) => ({
  proposal: one(proposals, {
    fields: [proposalVariableValues.proposalId],
    references: [proposals.id]
  }),
  variable: one(proposalVariables, {
    fields: [proposalVariableValues.variableId],
    references: [proposalVariables.id]
  }),
}));

export const proposalElementValuesRelations = relations(proposalElementValues, ({ one }) => ({
  proposal: one(proposals, {
    fields: [proposalElementValues.proposalId],
    references: [proposals.id]
  }),
  element: one(proposalElements, {
    fields: [proposalElementValues.elementId],
    references: [proposalElements.id]
  }),
}));

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type TemplateRow = typeof templates.$inferSelect;
export type ProposalRow = typeof proposals.$inferSelect;
export type CategoryRow = typeof proposalCategories.$inferSelect;
export type VariableRow = typeof proposalVariables.$inferSelect;
export type ElementRow = typeof proposalElements.$inferSelect;
export type VariableValueRow = typeof proposalVariableValues.$inferSelect;
export type ElementValueRow = typeof proposalElementValues.$inferSelect;
