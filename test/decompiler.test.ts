import type { CommandOptions, CommandResult, CommandRunner } from '../src/io'
import { existsSync } from 'node:fs'
import { rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ChampollionDecompiler, locateChampollion } from '../src/decompiler'
import { DecompilerError } from '../src/errors'
import { nullLogger } from '../src/logger'
import { createTempDir, writeFixture } from './test-utils'

interface Call {
  executable: string
  args: string[]
  options?: CommandOptions
}

function fakeRunner(behaviour: (args: string[]) => Promise<Partial<CommandResult>>): { runner: CommandRunner, calls: Call[] } {
  const calls: Call[] = []
  const runner: CommandRunner = async (executable, args, options) => {
    calls.push({ executable, args, options })
    return { exitCode: 0, stdout: '', stderr: '', timedOut: false, ...await behaviour(args) }
  }
  return { runner, calls }
}

/**
 * Runner that writes `<outputDir>/<stem>.psc` the way Champollion does
 */
function writingRunner(source = 'Scriptname Decompiled\n'): ReturnType<typeof fakeRunner> {
  return fakeRunner(async ([pex, , outputDir]) => {
    const stem = pex.split(/[\\/]/).pop()?.replace(/\.pex$/i, '') ?? 'unknown'
    await writeFile(join(outputDir, `${stem}.psc`), source)
    return {}
  })
}

describe('locateChampollion', () => {
  let dir: string

  beforeEach(async () => {
    dir = await createTempDir('champollion')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('accepts the executable itself', async () => {
    const exe = await writeFixture(dir, 'tools/Champollion.exe', '')
    expect(locateChampollion(exe)).toBe(exe)
  })

  it('accepts the directory holding the executable', async () => {
    const exe = await writeFixture(dir, 'tools/Champollion.exe', '')
    expect(locateChampollion(join(dir, 'tools'))).toBe(exe)
  })

  it('resolves relative paths against the working directory', async () => {
    const exe = await writeFixture(dir, 'tools/Champollion.exe', '')
    expect(locateChampollion('tools', dir)).toBe(exe)
  })

  it('finds the executable in the working directory', async () => {
    const exe = await writeFixture(dir, 'Champollion.exe', '')
    expect(locateChampollion(undefined, dir)).toBe(exe)
  })

  it('rejects a path that does not exist', () => {
    expect(() => locateChampollion(join(dir, 'missing.exe'))).toThrow(DecompilerError)
    expect(() => locateChampollion(join(dir, 'missing.exe'))).toThrow('Invalid Champollion path')
  })

  it('rejects a directory without the executable', () => {
    expect(() => locateChampollion(dir)).toThrow('Champollion.exe not found in directory')
  })

  it('fails when nothing is configured or found', () => {
    expect(() => locateChampollion(undefined, dir)).toThrow('Champollion.exe was not found')
  })
})

describe('ChampollionDecompiler', () => {
  let dir: string
  let exe: string
  let pex: string
  const decompilers: ChampollionDecompiler[] = []

  function create(runner: CommandRunner, timeoutMs = 5_000): ChampollionDecompiler {
    const decompiler = new ChampollionDecompiler({ enabled: true, champollionPath: exe, timeoutMs, runner, logger: nullLogger })
    decompilers.push(decompiler)
    return decompiler
  }

  beforeEach(async () => {
    dir = await createTempDir('decompile')
    exe = await writeFixture(dir, 'Champollion/Champollion.exe', '')
    pex = await writeFixture(dir, 'Data/Scripts/MQ101.pex', 'PEX')
  })

  afterEach(async () => {
    for (const decompiler of decompilers.splice(0)) {
      await decompiler.dispose()
    }
    await rm(dir, { recursive: true, force: true })
  })

  it('does nothing when disabled', async () => {
    const runner = vi.fn<CommandRunner>()
    const decompiler = new ChampollionDecompiler({ enabled: false, runner, logger: nullLogger })

    expect(decompiler.isAvailable()).toBe(false)
    expect(await decompiler.decompile(pex)).toBeNull()
    expect(runner).not.toHaveBeenCalled()
  })

  it('resolves a relative executable path against its working directory', () => {
    const decompiler = new ChampollionDecompiler({ enabled: true, champollionPath: 'Champollion', cwd: dir, logger: nullLogger })
    expect(decompiler.executable).toBe(exe)
  })

  it('fails at construction when enabled without an executable', () => {
    expect(() => new ChampollionDecompiler({ enabled: true, champollionPath: join(dir, 'nope'), logger: nullLogger }))
      .toThrow(DecompilerError)
  })

  it('runs Champollion and returns the produced source', async () => {
    const { runner, calls } = writingRunner()
    const decompiler = create(runner, 1_234)

    const output = await decompiler.decompile(pex)
    const outputDir = join(await decompiler.workDir(), 'decompiled')

    expect(output).toBe(join(outputDir, 'MQ101.psc'))
    expect(calls).toEqual([{ executable: exe, args: [pex, '--psc', outputDir], options: { timeoutMs: 1_234 } }])
  })

  it('returns null when Champollion fails', async () => {
    const { runner } = fakeRunner(async () => ({ exitCode: 1, stderr: 'bad pex' }))
    expect(await create(runner).decompile(pex)).toBeNull()
  })

  it('returns null on timeout', async () => {
    const { runner } = fakeRunner(async () => ({ exitCode: 1, timedOut: true }))
    expect(await create(runner).decompile(pex)).toBeNull()
  })

  it('returns null when the process cannot start', async () => {
    const { runner } = fakeRunner(async () => {
      throw new Error('spawn ENOENT')
    })
    expect(await create(runner).decompile(pex)).toBeNull()
  })

  it('returns null when no source was written', async () => {
    const { runner } = fakeRunner(async () => ({}))
    expect(await create(runner).decompile(pex)).toBeNull()
  })

  it('returns null for a missing pex without running anything', async () => {
    const { runner, calls } = writingRunner()
    expect(await create(runner).decompile(join(dir, 'Missing.pex'))).toBeNull()
    expect(calls).toHaveLength(0)
  })

  it('removes its work directory on dispose', async () => {
    const { runner } = writingRunner()
    const decompiler = create(runner)
    await decompiler.decompile(pex)
    const workDir = await decompiler.workDir()

    await decompiler.dispose()
    expect(existsSync(workDir)).toBe(false)
  })

  it('checks the executable answers with its banner', async () => {
    const ok = fakeRunner(async () => ({ exitCode: 1, stdout: 'Champollion PEX decompiler v1.3.2\nUsage: ...' }))
    const wrong = fakeRunner(async () => ({ stdout: 'something else' }))

    expect(await create(ok.runner).selfTest()).toBe(true)
    expect(ok.calls[0].args).toEqual(['--help'])
    expect(await create(wrong.runner).selfTest()).toBe(false)
  })
})
