// Durable key layout. Subject and session ids are encoded so that an id can
// never escape its own directory.

const SUBJECTS_ROOT = 'subjects'

const MIME_BY_EXTENSION: Record<string, string> = {
  '.webm': 'audio/webm',
  '.aac': 'audio/aac',
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.ogg': 'audio/ogg',
  '.flac': 'audio/flac',
  '.m4a': 'audio/mp4',
}

const EXTENSION_BY_MIME: Record<string, string> = {
  'audio/webm': '.webm',
  'audio/aac': '.aac',
  'audio/mpeg': '.mp3',
  'audio/mp3': '.mp3',
  'audio/wav': '.wav',
  'audio/x-wav': '.wav',
  'audio/ogg': '.ogg',
  'audio/flac': '.flac',
  'audio/mp4': '.m4a',
}

export function encodeSegment(value: string) {
  return encodeURIComponent(value.trim())
}

export function decodeSegment(value: string) {
  try {
    return decodeURIComponent(value)
  } catch {
    return value
  }
}

export function padIndex(index: number) {
  return String(index).padStart(4, '0')
}

export function subjectDir(subjectId: string) {
  return `${SUBJECTS_ROOT}/${encodeSegment(subjectId)}`
}

export function sessionsDir(subjectId: string) {
  return `${subjectDir(subjectId)}/sessions`
}

export function sessionDir(subjectId: string, sessionId: string) {
  return `${sessionsDir(subjectId)}/${encodeSegment(sessionId)}`
}

export function chunkBlobKey(subjectId: string, sessionId: string, index: number, extension: string) {
  return `${sessionDir(subjectId, sessionId)}/chunk-${padIndex(index)}${extension}`
}

export function chunkResultKey(subjectId: string, sessionId: string, index: number) {
  return `${sessionDir(subjectId, sessionId)}/chunk-${padIndex(index)}.json`
}

export function eventKey(subjectId: string, sessionId: string) {
  return `${sessionDir(subjectId, sessionId)}/event.json`
}

export function insightKey(subjectId: string, sessionId: string) {
  return `${sessionDir(subjectId, sessionId)}/insight.json`
}

export function memoryKey(subjectId: string) {
  return `${subjectDir(subjectId)}/memory.json`
}

export function extensionOf(pathOrName: string): string | null {
  const name = pathOrName.slice(pathOrName.lastIndexOf('/') + 1)
  const dot = name.lastIndexOf('.')
  if (dot <= 0) return null
  return name.slice(dot).toLowerCase()
}

export function mimeForExtension(extension: string) {
  return MIME_BY_EXTENSION[extension.toLowerCase()] ?? 'application/octet-stream'
}

export function extensionForMime(mime: string | null | undefined): string | null {
  if (!mime) return null
  const base = mime.split(';')[0]?.trim().toLowerCase() ?? ''
  return EXTENSION_BY_MIME[base] ?? null
}
