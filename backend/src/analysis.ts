import {
  detectCipherType,
  findRepeatedSequences,
  frequencyAnalysis,
  indexOfCoincidence,
  normalizeText,
  solveCaesar,
  solveVigenere,
  type DetectionResult,
  type SolverResult,
} from '@cipher-lab/core'

export interface AnalysisProgress {
  status: 'detecting' | 'solving' | 'completed'
  progress: number
  message: string
}

export interface AnalysisReport {
  detection: DetectionResult
  statistics: {
    letters: number
    ic: number
    frequencies: Array<[string, number]>
    repeatedSequences: Array<[string, number[]]>
  }
  candidates: SolverResult[]
  message: string
}

const FALLBACK_KEY_LENGTHS = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]

export function analyzeCiphertext(
  ciphertext: string,
  onProgress: (update: AnalysisProgress) => void = () => {},
  limit = 5,
): AnalysisReport {
  // Step 1: Detect cipher type
  onProgress({ status: 'detecting', progress: 10, message: 'Analyzing cipher characteristics...' })

  const detection = detectCipherType(ciphertext)
  const letters = normalizeText(ciphertext)

  onProgress({
    status: 'detecting',
    progress: 30,
    message: `Detected likely cipher: ${detection.likelyType.toUpperCase()}`,
  })

  // Step 2: Solve based on detected type, then try everything else
  onProgress({ status: 'solving', progress: 40, message: 'Attempting decryption...' })

  let primary: SolverResult[] = []
  if (detection.likelyType === 'monoalphabetic') {
    primary = solveCaesar(ciphertext)
  } else if (detection.likelyType === 'polyalphabetic') {
    primary = solveVigenere(ciphertext, detection.keyLengths)
  }

  onProgress({ status: 'solving', progress: 80, message: 'Trying all decryption methods...' })

  const all = [
    ...primary,
    ...solveCaesar(ciphertext),
    ...solveVigenere(ciphertext, FALLBACK_KEY_LENGTHS),
  ]

  // Deduplicate by plaintext; a Vigenère key of repeated letters is just a Caesar shift
  const seen = new Set<string>()
  const candidates = all
    .sort((a, b) => a.score - b.score)
    .filter((candidate) => {
      const fingerprint = candidate.plaintext.substring(0, 100)
      if (seen.has(fingerprint)) return false
      seen.add(fingerprint)
      return true
    })
    .slice(0, limit)

  const report: AnalysisReport = {
    detection,
    statistics: {
      letters: letters.length,
      ic: indexOfCoincidence(ciphertext),
      frequencies: [...frequencyAnalysis(letters, 1)],
      repeatedSequences: [...findRepeatedSequences(letters, 3, 5)].slice(0, 20),
    },
    candidates,
    message: `Analysis complete. Found ${candidates.length} candidate solutions.`,
  }

  onProgress({ status: 'completed', progress: 100, message: report.message })
  return report
}
