import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import {
    backupName,
    checkAndRotate,
    listBackups,
    needsRotation,
    parseSize,
} from '../../../src/core/logger/rotation.js'


describe('logger: rotation', () => {

    let dir: string
    let logFile: string

    beforeEach(async () => {

        dir = await mkdtemp(join(tmpdir(), 'gitenv-rotation-'))
        logFile = join(dir, 'gitenv.log')
    })

    afterEach(async () => {

        await rm(dir, { recursive: true, force: true })
    })

    describe('parseSize', () => {

        it('should parse units', () => {

            expect(parseSize('100')).toBe(100)
            expect(parseSize('512kb')).toBe(524288)
            expect(parseSize('5mb')).toBe(5242880)
            expect(parseSize('1GB')).toBe(1073741824)
            expect(parseSize('1.5kb')).toBe(1536)
        })

        it('should reject invalid sizes', () => {

            expect(() => parseSize('big')).toThrow('Invalid size format: big')
        })
    })

    describe('backupName', () => {

        it('should number the backup before the extension', () => {

            expect(backupName('/home/jane/.gitenv/gitenv.log', 2)).toBe('/home/jane/.gitenv/gitenv.2.log')
        })
    })

    describe('needsRotation', () => {

        it('should be false for a missing file', async () => {

            expect(await needsRotation(logFile, 10)).toBe(false)
        })

        it('should compare the size', async () => {

            await writeFile(logFile, '12345')

            expect(await needsRotation(logFile, 5)).toBe(true)
            expect(await needsRotation(logFile, 6)).toBe(false)
        })
    })

    describe('checkAndRotate', () => {

        it('should do nothing below the limit', async () => {

            await writeFile(logFile, 'small')

            expect(await checkAndRotate(logFile, '1kb', 3)).toEqual({ rotated: false })
        })

        it('should move the log to the first backup', async () => {

            await writeFile(logFile, 'current')

            const result = await checkAndRotate(logFile, '5b', 3)

            expect(result).toEqual({
                rotated: true,
                oldFile: logFile,
                newFile: join(dir, 'gitenv.1.log'),
                deletedFiles: [],
            })
            expect(await readFile(join(dir, 'gitenv.1.log'), 'utf-8')).toBe('current')
        })

        it('should shift backups and drop the oldest', async () => {

            await writeFile(logFile, 'current')
            await writeFile(join(dir, 'gitenv.1.log'), 'one')
            await writeFile(join(dir, 'gitenv.2.log'), 'two')

            const result = await checkAndRotate(logFile, '5b', 2)

            expect(result).toMatchObject({ rotated: true, deletedFiles: [join(dir, 'gitenv.2.log')] })
            expect((await readdir(dir)).sort()).toEqual(['gitenv.1.log', 'gitenv.2.log'])
            expect(await readFile(join(dir, 'gitenv.1.log'), 'utf-8')).toBe('current')
            expect(await readFile(join(dir, 'gitenv.2.log'), 'utf-8')).toBe('one')
        })

        it('should list backups in order', async () => {

            await writeFile(join(dir, 'gitenv.10.log'), '')
            await writeFile(join(dir, 'gitenv.2.log'), '')
            await writeFile(join(dir, 'other.1.log'), '')

            expect(await listBackups(logFile)).toEqual([
                [2, join(dir, 'gitenv.2.log')],
                [10, join(dir, 'gitenv.10.log')],
            ])
        })
    })
})
