import { readFile, realpath, stat } from 'node:fs/promises'
import path from 'path'
import { PDFParse } from 'pdf-parse'
import { ValidationError } from '../errors.js'
import { computeDocumentId } from './canonicalRecord.js'

export type PageImage = {
  pageNumber: number
  image: Uint8Array
}

export type SourceDocument = {
  documentId: string
  fileName: string
  sourceType: 'pdf' | 'image'
  bytes: Uint8Array
}

export type PageRasterizer = (pdf: Uint8Array, scale: number) => Promise<PageImage[]>

export type DocumentSourceOptions = {
  allowedExtensions: string[]
  maxFileSizeBytes: number
  renderScale: number
  rasterize?: PageRasterizer
}

export async function rasterizePdf(pdf: Uint8Array, scale: number): Promise<PageImage[]> {
  const parser = new PDFParse({ data: pdf })
  try {
    const result = await parser.getScreenshot({ scale })
    return result.pages.map((page) => ({ pageNumber: page.pageNumber, image: page.data }))
  } finally {
    await parser.destroy()
  }
}

function isInside(root: string, target: string) {
  const relative = path.relative(root, target)
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative))
}

async function realpathIfExists(target: string) {
  try {
    return await realpath(target)
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null
    throw error
  }
}

/**
 * Resolves a requested input against the input root. Returns null when the
 * path, or the file a symlink points at, lies outside the root.
 */
export async function resolveInputPath(inputDir: string, requested: string): Promise<string | null> {
  const root = path.resolve(inputDir)
  const resolved = path.resolve(root, requested)
  if (!isInside(root, resolved)) return null

  const realTarget = await realpathIfExists(resolved)
  if (realTarget) {
    const realRoot = (await realpathIfExists(root)) || root
    if (!isInside(realRoot, realTarget)) return null
  }
  return resolved
}

export async function readSourceDocument(filePath: string, options: DocumentSourceOptions): Promise<SourceDocument> {
  const extension = path.extname(filePath).toLowerCase()
  if (!options.allowedExtensions.includes(extension)) {
    throw new ValidationError('InvalidInput', `UNSUPPORTED_FILE_TYPE: ${extension || '(none)'}`)
  }

  let size: number
  try {
    size = (await stat(filePath)).size
  } catch (error) {
    throw new ValidationError('InvalidInput', `FILE_NOT_FOUND: ${filePath}: ${error instanceof Error ? error.message : String(error)}`)
  }
  if (size === 0) {
    throw new ValidationError('InvalidInput', `EMPTY_FILE: ${filePath}`)
  }
  if (size > options.maxFileSizeBytes) {
    throw new ValidationError('InvalidInput', `FILE_TOO_LARGE: ${size} > ${options.maxFileSizeBytes}`)
  }

  const bytes = new Uint8Array(await readFile(filePath))
  return {
    documentId: computeDocumentId(bytes),
    fileName: path.basename(filePath),
    sourceType: extension === '.pdf' ? 'pdf' : 'image',
    bytes
  }
}

// Image inputs are a single page; PDFs are rasterized page by page.
export async function loadPageImages(source: SourceDocument, options: Pick<DocumentSourceOptions, 'renderScale' | 'rasterize'>): Promise<PageImage[]> {
  if (source.sourceType === 'image') {
    return [{ pageNumber: 1, image: source.bytes }]
  }

  const rasterize = options.rasterize || rasterizePdf
  const pages = await rasterize(source.bytes, options.renderScale)
  if (pages.length === 0) {
    throw new ValidationError('InvalidInput', `PDF_HAS_NO_PAGES: ${source.fileName}`)
  }
  return pages
}
