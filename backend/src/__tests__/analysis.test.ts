import { readFileSync } from 'node:fs'
import { describe, it, expect } from 'vitest'
import { caesarEncrypt, normalizeText, vigenereEncrypt } from '@cipher-lab/core'
import { analyzeCiphertext, type AnalysisProgress } from '../analysis.js'

const DISPATCH = readFileSync(new URL('./fixtures/dispatch.txt', import.meta.url), 'utf8')

describe('analyzeCiphertext', () => {
  it('reports progress through every stage', () => {
    const updates: AnalysisProgress[] = []
    analyzeCiphertext(caesarEncrypt(DISPATCH, 9), (update) => updates.push(update))

    expect(updates.map((update) => update.progress)).toEqual([10, 30, 40, 80, 100])
    expect(updates[1].message).toBe('Detected likely cipher: MONOALPHABETIC')
    expect(updates[4].status).toBe('completed')
  })

  it('ranks the Caesar shift first and drops duplicate plaintexts', () => {
    const report = analyzeCiphertext(caesarEncrypt(DISPATCH, 9))

    expect(report.detection.likelyType).toBe('monoalphabetic')
    expect(report.candidates[0]).toMatchObject({ type: 'caesar', shift: 9, key: 'J' })
    expect(report.candidates[0].plaintext).toBe(normalizeText(DISPATCH))

    const plaintexts = report.candidates.map((candidate) => candidate.plaintext)
    expect(new Set(plaintexts).size).toBe(plaintexts.length)
  })

  it('solves a Vigenère ciphertext', () => {
    const report = analyzeCiphertext(vigenereEncrypt(DISPATCH, 'ORBIT'))

    expect(report.detection.likelyType).toBe('polyalphabetic')
    expect(report.candidates[0].type).toBe('vigenere')
    expect(report.candidates[0].plaintext).toBe(normalizeText(DISPATCH))
  })

  it('includes letter statistics', () => {
    const report = analyzeCiphertext('AABB CC!', () => {}, 2)

    expect(report.statistics.letters).toBe(6)
    expect(report.statistics.ic).toBeCloseTo(0.2, 10)
    expect(report.statistics.frequencies.map(([letter]) => letter)).toEqual(['A', 'B', 'C'])
    expect(report.candidates).toHaveLength(2)
  })
})
