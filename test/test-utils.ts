import { mkdir, mkdtemp, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import { deflateSync } from 'node:zlib'
import { BsaFlags } from '../src/archive'

export interface FixtureFile {
  /** Folder inside the archive, backslash separated like the game's archives */
  folder: string
  name: string
  content: string | Buffer
  /** Defaults to the archive's compression flag */
  compressed?: boolean
}

export interface FixtureOptions {
  version?: 103 | 104 | 105
  flags?: number
}

function u32(value: number): Buffer {
  const buffer = Buffer.alloc(4)
  buffer.writeUInt32LE(value, 0)
  return buffer
}

/**
 * Build a BSA archive in memory
 */
export function buildBsa(files: FixtureFile[], options: FixtureOptions = {}): Buffer {
  const version = options.version ?? 104
  const flags = options.flags ?? (BsaFlags.INCLUDE_DIRECTORY_NAMES | BsaFlags.INCLUDE_FILE_NAMES)
  const compressedByDefault = (flags & BsaFlags.COMPRESSED) !== 0
  const hasFolderNames = (flags & BsaFlags.INCLUDE_DIRECTORY_NAMES) !== 0
  const hasFileNames = (flags & BsaFlags.INCLUDE_FILE_NAMES) !== 0
  const embedNames = version >= 104 && (flags & BsaFlags.EMBED_FILE_NAMES) !== 0
  const folderRecordSize = version === 105 ? 24 : 16

  const folders = new Map<string, FixtureFile[]>()
  for (const file of files) {
    const group = folders.get(file.folder) ?? []
    group.push(file)
    folders.set(file.folder, group)
  }
  const ordered = [...folders.values()].flat()

  const totalFolderNameLength = [...folders.keys()].reduce((sum, name) => sum + name.length + 1, 0)
  const totalFileNameLength = ordered.reduce((sum, file) => sum + file.name.length + 1, 0)
  const directorySize = 36
    + folders.size * folderRecordSize
    + (hasFolderNames ? totalFolderNameLength + folders.size : 0)
    + ordered.length * 16
    + (hasFileNames ? totalFileNameLength : 0)

  const payloads = ordered.map((file) => {
    const content = typeof file.content === 'string' ? Buffer.from(file.content, 'utf-8') : file.content
    const compressed = file.compressed ?? compressedByDefault
    let body = compressed ? Buffer.concat([u32(content.length), deflateSync(content)]) : content
    if (embedNames) {
      const embedded = Buffer.from(`${file.folder}\\${file.name}`, 'latin1')
      body = Buffer.concat([Buffer.from([embedded.length]), embedded, body])
    }
    return { body, toggled: compressed !== compressedByDefault }
  })

  const header = Buffer.alloc(36)
  header.writeUInt32LE(0x00415342, 0)
  header.writeUInt32LE(version, 4)
  header.writeUInt32LE(36, 8)
  header.writeUInt32LE(flags, 12)
  header.writeUInt32LE(folders.size, 16)
  header.writeUInt32LE(ordered.length, 20)
  header.writeUInt32LE(totalFolderNameLength, 24)
  header.writeUInt32LE(totalFileNameLength, 28)

  const folderRecords = [...folders.values()].map((group) => {
    const record = Buffer.alloc(folderRecordSize)
    record.writeUInt32LE(group.length, 8)
    return record
  })

  let offset = directorySize
  let index = 0
  const folderBlocks: Buffer[] = []
  for (const [name, group] of folders) {
    if (hasFolderNames) {
      const nameBytes = Buffer.from(`${name}\0`, 'latin1')
      folderBlocks.push(Buffer.from([nameBytes.length]), nameBytes)
    }

    for (let i = 0; i < group.length; i++) {
      const { body, toggled } = payloads[index++]
      const record = Buffer.alloc(16)
      record.writeUInt32LE(body.length | (toggled ? 0x40000000 : 0), 8)
      record.writeUInt32LE(offset, 12)
      folderBlocks.push(record)
      offset += body.length
    }
  }

  const fileNames = hasFileNames
    ? Buffer.from(ordered.map(file => `${file.name}\0`).join(''), 'latin1')
    : Buffer.alloc(0)

  return Buffer.concat([
    header,
    ...folderRecords,
    ...folderBlocks,
    fileNames,
    ...payloads.map(payload => payload.body),
  ])
}

export async function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `psc-headers-${prefix}-`))
}

/**
 * Write a file below `root`, creating directories on the way
 */
export async function writeFixture(root: string, relativePath: string, content: string | Buffer): Promise<string> {
  const path = join(root, relativePath)
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, content)
  return path
}
