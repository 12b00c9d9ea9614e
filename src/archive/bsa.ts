/**
 * Reader for Bethesda BSA archives (versions 103, 104 and 105).
 *
 * Only the directory is read up front; entry data is read on demand
 * through an open file handle.
 */

import type { FileHandle } from 'node:fs/promises'
import { open } from 'node:fs/promises'
import { inflateSync } from 'node:zlib'
import { ArchiveError } from '../errors'

const MAGIC = 0x00415342 // 'BSA\0'
const HEADER_SIZE = 36
const FILE_RECORD_SIZE = 16

export const BsaFlags = {
  INCLUDE_DIRECTORY_NAMES: 0x1,
  INCLUDE_FILE_NAMES: 0x2,
  COMPRESSED: 0x4,
  EMBED_FILE_NAMES: 0x100,
} as const

const SIZE_MASK = 0x3FFFFFFF
const COMPRESSION_TOGGLE = 0x40000000

export type BsaVersion = 103 | 104 | 105

export interface BsaHeader {
  version: BsaVersion
  archiveFlags: number
  folderCount: number
  fileCount: number
  totalFolderNameLength: number
  totalFileNameLength: number
}

export interface BsaEntry {
  /** Path inside the archive with forward slashes, e.g. `scripts/source/actor.psc` */
  path: string
  /** File name only, lower-cased */
  name: string
  offset: number
  size: number
  compressed: boolean
}

export interface BsaDirectory {
  header: BsaHeader
  entries: BsaEntry[]
}

function isSupportedVersion(version: number): version is BsaVersion {
  return version === 103 || version === 104 || version === 105
}

function folderRecordSize(version: BsaVersion): number {
  return version === 105 ? 24 : 16
}

export function parseBsaHeader(buffer: Buffer, archivePath: string): BsaHeader {
  if (buffer.length < HEADER_SIZE || buffer.readUInt32LE(0) !== MAGIC) {
    throw new ArchiveError('Not a BSA archive', archivePath)
  }

  const version = buffer.readUInt32LE(4)
  if (!isSupportedVersion(version)) {
    throw new ArchiveError(`Unsupported BSA version ${version}`, archivePath)
  }

  return {
    version,
    archiveFlags: buffer.readUInt32LE(12),
    folderCount: buffer.readUInt32LE(16),
    fileCount: buffer.readUInt32LE(20),
    totalFolderNameLength: buffer.readUInt32LE(24),
    totalFileNameLength: buffer.readUInt32LE(28),
  }
}

/**
 * Bytes from the start of the archive to the end of the file name block
 */
export function directorySize(header: BsaHeader): number {
  const folderNames = header.archiveFlags & BsaFlags.INCLUDE_DIRECTORY_NAMES
    ? header.totalFolderNameLength + header.folderCount
    : 0
  const fileNames = header.archiveFlags & BsaFlags.INCLUDE_FILE_NAMES ? header.totalFileNameLength : 0

  return HEADER_SIZE
    + header.folderCount * folderRecordSize(header.version)
    + folderNames
    + header.fileCount * FILE_RECORD_SIZE
    + fileNames
}

/**
 * Parse the folder and file records of an archive
 */
export function parseBsaDirectory(buffer: Buffer, archivePath: string): BsaDirectory {
  const header = parseBsaHeader(buffer, archivePath)
  if (buffer.length < directorySize(header)) {
    throw new ArchiveError('Truncated BSA directory', archivePath)
  }

  const folderCounts: number[] = []
  let pos = HEADER_SIZE
  for (let i = 0; i < header.folderCount; i++) {
    folderCounts.push(buffer.readUInt32LE(pos + 8))
    pos += folderRecordSize(header.version)
  }

  const hasFolderNames = (header.archiveFlags & BsaFlags.INCLUDE_DIRECTORY_NAMES) !== 0
  const compressedByDefault = (header.archiveFlags & BsaFlags.COMPRESSED) !== 0
  const records: Array<Omit<BsaEntry, 'path' | 'name'> & { folder: string }> = []

  for (const count of folderCounts) {
    let folder = ''
    if (hasFolderNames) {
      const length = buffer.readUInt8(pos)
      // Length includes the terminating null
      folder = buffer.toString('latin1', pos + 1, pos + length).replace(/\0+$/, '')
      pos += 1 + length
    }

    for (let i = 0; i < count; i++) {
      const rawSize = buffer.readUInt32LE(pos + 8)
      records.push({
        folder,
        size: rawSize & SIZE_MASK,
        compressed: ((rawSize & COMPRESSION_TOGGLE) !== 0) !== compressedByDefault,
        offset: buffer.readUInt32LE(pos + 12),
      })
      pos += FILE_RECORD_SIZE
    }
  }

  if (records.length !== header.fileCount) {
    throw new ArchiveError(`Expected ${header.fileCount} file records, found ${records.length}`, archivePath)
  }

  const names: string[] = []
  if (header.archiveFlags & BsaFlags.INCLUDE_FILE_NAMES) {
    const block = buffer.toString('latin1', pos, pos + header.totalFileNameLength)
    names.push(...block.split('\0').slice(0, header.fileCount))
  }

  const entries = records.map((record, index): BsaEntry => {
    const name = (names[index] ?? '').toLowerCase()
    const folder = record.folder.replace(/\\/g, '/').toLowerCase()
    return {
      path: folder ? `${folder}/${name}` : name,
      name,
      offset: record.offset,
      size: record.size,
      compressed: record.compressed,
    }
  })

  return { header, entries }
}

/**
 * Turn an entry's stored bytes into file content
 */
export function decodeEntryData(raw: Buffer, entry: BsaEntry, header: BsaHeader, archivePath: string): Buffer {
  let pos = 0

  if (header.version >= 104 && header.archiveFlags & BsaFlags.EMBED_FILE_NAMES) {
    pos += 1 + raw.readUInt8(0)
  }

  if (!entry.compressed) {
    return raw.subarray(pos)
  }

  if (header.version === 105) {
    throw new ArchiveError('LZ4-compressed entries are not supported', archivePath, entry.path)
  }

  const originalSize = raw.readUInt32LE(pos)
  let data: Buffer
  try {
    data = inflateSync(raw.subarray(pos + 4))
  }
  catch (error) {
    throw new ArchiveError('Could not decompress entry', archivePath, entry.path, error instanceof Error ? error : undefined)
  }

  if (data.length !== originalSize) {
    throw new ArchiveError(`Decompressed ${data.length} bytes, expected ${originalSize}`, archivePath, entry.path)
  }
  return data
}

/**
 * An open archive
 */
export class BsaReader {
  readonly path: string
  readonly header: BsaHeader
  readonly entries: readonly BsaEntry[]
  private readonly handle: FileHandle

  private constructor(path: string, handle: FileHandle, directory: BsaDirectory) {
    this.path = path
    this.handle = handle
    this.header = directory.header
    this.entries = directory.entries
  }

  static async open(path: string): Promise<BsaReader> {
    const handle = await open(path, 'r')
    try {
      const headerBytes = Buffer.alloc(HEADER_SIZE)
      await handle.read(headerBytes, 0, HEADER_SIZE, 0)
      const header = parseBsaHeader(headerBytes, path)

      const size = directorySize(header)
      const directoryBytes = Buffer.alloc(size)
      const { bytesRead } = await handle.read(directoryBytes, 0, size, 0)
      const directory = parseBsaDirectory(directoryBytes.subarray(0, bytesRead), path)

      return new BsaReader(path, handle, directory)
    }
    catch (error) {
      await handle.close()
      throw error
    }
  }

  async read(entry: BsaEntry): Promise<Buffer> {
    const raw = Buffer.alloc(entry.size)
    const { bytesRead } = await this.handle.read(raw, 0, entry.size, entry.offset)
    if (bytesRead !== entry.size) {
      throw new ArchiveError('Entry data runs past end of archive', this.path, entry.path)
    }
    return decodeEntryData(raw, entry, this.header, this.path)
  }

  async close(): Promise<void> {
    await this.handle.close()
  }
}
