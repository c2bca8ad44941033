/**
 * Log Rotation
 *
 * Size-based rotation with numbered backups:
 *
 * ```
 * gitenv.log     (current)
 * gitenv.1.log   (newest backup)
 * gitenv.2.log
 * ```
 *
 * On rotation every backup shifts up by one and the current file becomes
 * `.1`. Backups numbered above maxFiles are deleted.
 */
import { stat, rename, readdir, unlink } from 'node:fs/promises'
import { dirname, basename, join, extname } from 'node:path'
import { attempt } from '@logosdx/utils'

import type { RotationResult } from './types.js'


const SIZE_UNITS: Record<string, number> = {
    b: 1,
    kb: 1024,
    mb: 1024 * 1024,
    gb: 1024 * 1024 * 1024,
}


/**
 * Parse a size string (e.g., '5mb', '512kb') to bytes.
 *
 * @example
 * ```typescript
 * parseSize('5mb')   // 5242880
 * parseSize('512kb') // 524288
 * parseSize('100')   // 100
 * ```
 */
export function parseSize(size: string): number {

    const match = /^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/.exec(size.trim().toLowerCase())
    const multiplier = SIZE_UNITS[match?.[2] ?? 'b']

    if (!match?.[1] || multiplier === undefined) {

        throw new Error(`Invalid size format: ${size}`)
    }

    return Math.floor(parseFloat(match[1]) * multiplier)
}


/**
 * Path of the n-th backup.
 *
 * @example
 * ```typescript
 * backupName('/home/jane/.gitenv/gitenv.log', 2) // '/home/jane/.gitenv/gitenv.2.log'
 * ```
 */
export function backupName(filepath: string, index: number): string {

    const ext = extname(filepath)
    const base = basename(filepath, ext)

    return join(dirname(filepath), `${base}.${index}${ext}`)
}


/**
 * Existing backups of `filepath`, as [index, path], lowest index first.
 */
export async function listBackups(filepath: string): Promise<Array<[number, string]>> {

    const ext = extname(filepath)
    const base = basename(filepath, ext)
    const pattern = new RegExp(`^${escapeRegex(base)}\\.(\\d+)${escapeRegex(ext)}$`)

    const [files, err] = await attempt(() => readdir(dirname(filepath)))

    if (err) return []

    const backups: Array<[number, string]> = []

    for (const file of files) {

        const index = pattern.exec(file)?.[1]

        if (index) backups.push([Number(index), join(dirname(filepath), file)])
    }

    return backups.sort((a, b) => a[0] - b[0])
}


/**
 * Whether the file has reached maxSize. Missing files never need rotation.
 */
export async function needsRotation(filepath: string, maxSize: number): Promise<boolean> {

    const [stats, err] = await attempt(() => stat(filepath))

    if (err) return false

    return stats.size >= maxSize
}


/**
 * Rotate if the file has reached `maxSize`.
 *
 * @example
 * ```typescript
 * const result = await checkAndRotate('/home/jane/.gitenv/gitenv.log', '5mb', 3)
 * if (result.rotated) {
 *     console.log(`Moved to ${result.newFile}`)
 * }
 * ```
 */
export async function checkAndRotate(
    filepath: string,
    maxSizeStr: string,
    maxFiles: number,
): Promise<RotationResult> {

    if (!await needsRotation(filepath, parseSize(maxSizeStr))) {

        return { rotated: false }
    }

    const backups = await listBackups(filepath)
    const deletedFiles: string[] = []

    // Highest first so a rename never lands on a file not yet moved
    for (const [index, path] of [...backups].reverse()) {

        if (index >= maxFiles) {

            const [, err] = await attempt(() => unlink(path))

            if (!err) deletedFiles.push(path)
            continue
        }

        await rename(path, backupName(filepath, index + 1))
    }

    const newFile = backupName(filepath, 1)
    const [, renameErr] = await attempt(() => rename(filepath, newFile))

    if (renameErr) {

        throw new Error(`Failed to rotate log file: ${renameErr.message}`)
    }

    return {
        rotated: true,
        oldFile: filepath,
        newFile,
        deletedFiles,
    }
}


function escapeRegex(str: string): string {

    return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
