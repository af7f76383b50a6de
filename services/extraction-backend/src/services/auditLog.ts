import { appendFile, mkdir, readFile } from 'node:fs/promises'
import path from 'path'
import { IOError, describeError } from '../errors.js'
import type { AuditEntry, AuditStage, AuditStatus } from '../types.js'

export const AUDIT_LOG_FILE = 'audit_log.jsonl'

export type AuditLog = {
  append(entry: { documentId: string; stage: AuditStage; status: AuditStatus; detail: string }): Promise<AuditEntry | null>
  read(documentId?: string): Promise<AuditEntry[]>
}

function isAuditEntry(value: unknown): value is AuditEntry {
  if (!value || typeof value !== 'object') return false
  return 'document_id' in value && typeof value.document_id === 'string'
    && 'stage' in value && (value.stage === 'OCR' || value.stage === 'NER' || value.stage === 'SINK')
    && 'status' in value && (value.status === 'OK' || value.status === 'FAILED')
    && 'timestamp' in value && typeof value.timestamp === 'string'
    && 'detail' in value && typeof value.detail === 'string'
}

/**
 * Append-only JSONL audit log. Each entry is written with a single appendFile
 * call (O_APPEND), so concurrent documents never interleave partial lines.
 */
export function createFileAuditLog(params: { outputDir: string; enabled: boolean; now?: () => Date }): AuditLog {
  const filePath = path.join(params.outputDir, AUDIT_LOG_FILE)
  const now = params.now || (() => new Date())

  return {
    async append(entry) {
      if (!params.enabled) return null

      const record: AuditEntry = {
        document_id: entry.documentId,
        stage: entry.stage,
        status: entry.status,
        timestamp: now().toISOString(),
        detail: entry.detail
      }
      try {
        await mkdir(params.outputDir, { recursive: true })
        await appendFile(filePath, `${JSON.stringify(record)}\n`, 'utf8')
      } catch (error) {
        throw new IOError('WriteFailed', `AUDIT_WRITE_FAILED: ${filePath}: ${describeError(error)}`, { cause: error })
      }
      return record
    },

    async read(documentId?: string) {
      let content: string
      try {
        content = await readFile(filePath, 'utf8')
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return []
        throw error
      }

      const entries: AuditEntry[] = []
      for (const line of content.split('\n')) {
        if (!line.trim()) continue
        let parsed: unknown
        try {
          parsed = JSON.parse(line)
        } catch {
          console.warn('[audit-log] skipping unparseable line', { filePath })
          continue
        }
        if (!isAuditEntry(parsed)) continue
        if (documentId && parsed.document_id !== documentId) continue
        entries.push(parsed)
      }
      return entries
    }
  }
}
