import type { EntityKind } from '../types.js'

export type VendorTaxonomy = Readonly<Record<string, EntityKind>>

export const COMPREHEND_MEDICAL_TAXONOMY: VendorTaxonomy = {
  MEDICAL_CONDITION: 'Diagnosis',
  MEDICATION: 'Medication',
  TEST_TREATMENT_PROCEDURE: 'Test'
}

export const LLM_TAXONOMY: VendorTaxonomy = {
  diagnosis: 'Diagnosis',
  condition: 'Diagnosis',
  problem: 'Diagnosis',
  disease: 'Diagnosis',
  medication: 'Medication',
  drug: 'Medication',
  medicine: 'Medication',
  test: 'Test',
  lab: 'Test',
  procedure: 'Test',
  observation: 'Test'
}

// Unmapped vendor categories land in Other.
export function mapVendorCategory(taxonomy: VendorTaxonomy, category: string | null | undefined): EntityKind {
  const raw = String(category || '').trim()
  if (!raw) return 'Other'
  if (Object.hasOwn(taxonomy, raw)) return taxonomy[raw]
  const lower = raw.toLowerCase()
  return Object.hasOwn(taxonomy, lower) ? taxonomy[lower] : 'Other'
}
