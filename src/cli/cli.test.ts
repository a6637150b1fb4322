import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import type { Command } from 'commander'
import { createProgram } from './program.js'
import { parseParams } from './params.js'
import { output } from './output.js'
import { Database } from '../database/database.js'
import { silentReporter } from '../diagnostics/reporter.js'

describe('CLI', () => {
  let tempDir: string
  let dbPath: string
  let exitSpy: MockInstance
  let stdoutSpy: MockInstance
  let stderrSpy: MockInstance

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'sqlite-facade-cli-test-'))
    dbPath = join(tempDir, 'app.db')
    exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
    stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(tempDir, { recursive: true, force: true })
  })

  function program(): Command {
    return createProgram().exitOverride()
  }

  function run(...args: string[]): void {
    program().parse(['node', 'sqlite-facade', ...args])
  }

  function written(spy: MockInstance): string {
    return spy.mock.calls.map((call) => String(call[0])).join('')
  }

  function seedPeople(): void {
    const db = new Database(dbPath, { reporter: silentReporter })
    db.exec("CREATE TABLE people (id INTEGER PRIMARY KEY, name TEXT); INSERT INTO people (name) VALUES ('Ada'), ('Grace')")
    db.close()
  }

  describe('help output', () => {
    it('should list every command', () => {
      const help = program().helpInformation()
      expect(help).toContain('exec')
      expect(help).toContain('run')
      expect(help).toContain('query')
    })
  })

  describe('exec command', () => {
    it('should run statements against the database file', () => {
      run('exec', 'CREATE TABLE t (id INTEGER PRIMARY KEY)', '-d', dbPath)

      expect(exitSpy).not.toHaveBeenCalled()
      expect(written(stdoutSpy)).toBe('OK: executed\n')
      const db = new Database(dbPath, { reporter: silentReporter })
      expect(db.prepare('SELECT id FROM t').valid).toBe(true)
      db.close()
    })

    it('should print the engine diagnostic and exit 1 on failure', () => {
      run('exec', 'BOGUS', '-d', dbPath)

      expect(written(stderrSpy)).toBe('Error: Database exec failed: near "BOGUS": syntax error\n')
      expect(exitSpy).toHaveBeenCalledWith(1)
    })

    it('should exit 1 when the database cannot be opened', () => {
      run('exec', 'SELECT 1', '-d', join(tempDir, 'missing', 'app.db'))

      expect(written(stderrSpy)).toMatch(/^Error: /)
      expect(exitSpy).toHaveBeenCalledWith(1)
    })

    it('should take the database path from the config file', () => {
      const configPath = join(tempDir, 'sqlite-facade.config.json')
      writeFileSync(configPath, JSON.stringify({ database: { path: dbPath } }))

      run('exec', 'CREATE TABLE configured (x)', '-c', configPath)

      expect(exitSpy).not.toHaveBeenCalled()
      const db = new Database(dbPath, { reporter: silentReporter })
      expect(db.prepare('SELECT x FROM configured').valid).toBe(true)
      db.close()
    })
  })

  describe('run command', () => {
    it('should execute with parameters and print the last insert id', () => {
      seedPeople()
      run('run', 'INSERT INTO people (name) VALUES (?)', '-d', dbPath, '-p', '"Barbara"')

      expect(exitSpy).not.toHaveBeenCalled()
      expect(written(stdoutSpy)).toBe('OK: last insert id 3\n')
    })

    it('should exit 1 for a parameter that is not JSON', () => {
      run('run', 'INSERT INTO people (name) VALUES (?)', '-d', dbPath, '-p', '{bad')

      expect(written(stderrSpy)).toBe('Error: Parameter 1 is not valid JSON: {bad\n')
      expect(exitSpy).toHaveBeenCalledWith(1)
    })

    it('should exit 1 when the statement returns rows', () => {
      run('run', 'SELECT 1', '-d', dbPath)

      expect(written(stderrSpy)).toBe('Error: Statement execution failed: another row available\n')
      expect(exitSpy).toHaveBeenCalledWith(1)
    })
  })

  describe('query command', () => {
    it('should print rows as a table', () => {
      seedPeople()
      run('query', 'SELECT id, name FROM people ORDER BY id', '-d', dbPath)

      expect(exitSpy).not.toHaveBeenCalled()
      expect(written(stdoutSpy)).toBe(['id  name', '--  -----', '1   Ada', '2   Grace', '(2 rows)', ''].join('\n'))
    })

    it('should stop at the limit', () => {
      seedPeople()
      run('query', 'SELECT name FROM people ORDER BY id', '-d', dbPath, '-l', '1')

      expect(written(stdoutSpy)).toBe(['name', '----', 'Ada', '(1 row)', ''].join('\n'))
    })

    it('should bind parameters', () => {
      seedPeople()
      run('query', 'SELECT name FROM people WHERE id = ?', '-d', dbPath, '-p', '2')

      expect(written(stdoutSpy)).toBe(['name', '-----', 'Grace', '(1 row)', ''].join('\n'))
    })

    it('should render nulls and blobs', () => {
      run('query', "SELECT x'0102' AS b, NULL AS n")

      expect(written(stdoutSpy)).toBe(['b        n', '-------  ----', "x'0102'  NULL", '(1 row)', ''].join('\n'))
    })

    it('should exit 1 for a query that does not compile', () => {
      run('query', 'SELECT * FROM missing', '-d', dbPath)

      expect(written(stderrSpy)).toBe('Error: Database prepare failed: no such table: missing\n')
      expect(exitSpy).toHaveBeenCalledWith(1)
    })

    it('should exit 1 for an invalid limit', () => {
      run('query', 'SELECT 1', '-l', 'many')

      expect(written(stderrSpy)).toBe('Error: Invalid limit: many\n')
      expect(exitSpy).toHaveBeenCalledWith(1)
    })
  })
})

describe('output', () => {
  it('should expose only the writers the commands use', () => {
    expect(Object.keys(output).sort()).toEqual(['error', 'info', 'success', 'table'])
  })
})

describe('parseParams', () => {
  it('should map JSON values to bind values in order', () => {
    expect(parseParams(['null', '1.5', '"x"'])).toEqual([null, 1.5, 'x'])
  })

  it('should decode hex blobs and big integers', () => {
    expect(parseParams(['{"blob":"0a0b"}', '{"bigint":"9007199254740993"}'])).toEqual([
      { kind: 'blob', value: { data: new Uint8Array([10, 11]), size: 2 } },
      { kind: 'bigInteger', value: 9007199254740993n },
    ])
  })

  it('should reject values outside the schema with their position', () => {
    expect(() => parseParams(['1', 'true'])).toThrow('Parameter 2 is not a supported value: true')
  })
})
