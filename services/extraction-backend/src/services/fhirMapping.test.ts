import test from 'node:test'
import assert from 'node:assert/strict'
import type { CanonicalDocument } from '../types.js'
import { toFhirBundle } from './fhirMapping.js'

const doc: CanonicalDocument = {
  document_id: 'abc123',
  created_at: '2026-05-06T07:08:09.000Z',
  pages: [{ page_number: 1, text: 'x', bounding_boxes: [] }],
  entities: [
    { kind: 'Diagnosis', value: 'Hypertension', source_page: 1, confidence: 0.9 },
    { kind: 'Medication', value: 'Lisinopril', source_page: 1, confidence: 0.9 },
    { kind: 'Test', value: 'HbA1c', source_page: 1, confidence: 0.8 },
    { kind: 'Other', value: 'follow-up', source_page: 1, confidence: 0.5 }
  ]
}

test('toFhirBundle maps each kind to its resource and drops Other', () => {
  assert.deepEqual(toFhirBundle(doc), {
    resourceType: 'Bundle',
    id: 'abc123',
    type: 'collection',
    timestamp: '2026-05-06T07:08:09.000Z',
    entry: [
      {
        fullUrl: 'urn:extraction:Condition/abc123-1',
        resource: { resourceType: 'Condition', id: 'abc123-1', code: { text: 'Hypertension' } }
      },
      {
        fullUrl: 'urn:extraction:MedicationStatement/abc123-2',
        resource: { resourceType: 'MedicationStatement', id: 'abc123-2', status: 'unknown', medicationCodeableConcept: { text: 'Lisinopril' } }
      },
      {
        fullUrl: 'urn:extraction:Observation/abc123-3',
        resource: { resourceType: 'Observation', id: 'abc123-3', status: 'preliminary', code: { text: 'HbA1c' } }
      }
    ]
  })
})

test('toFhirBundle of a document without entities has no entries', () => {
  assert.deepEqual(toFhirBundle({ ...doc, entities: [] }).entry, [])
})
