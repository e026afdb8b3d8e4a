import { InvalidBuildDeclarationError } from './errors.js'

/**
 * One `FROM` instruction of a Dockerfile
 */
export interface DockerfileStage {
  /** Image reference, or the name of an earlier stage */
  image: string
  /** Name given with `AS`, if any */
  alias?: string
  /** 1-based line number of the instruction */
  line: number
}

/**
 * Lists the build stages of a Dockerfile, in order.
 *
 * Throws `InvalidBuildDeclarationError` when there is no `FROM` at all or
 * when one cannot be read as `FROM [--flag=value...] image [AS name]`.
 */
export function parseDockerfileStages(dockerfile: string): DockerfileStage[] {
  const stages: DockerfileStage[] = []

  for (const { text, line } of logicalLines(dockerfile)) {
    const [instruction, ...rest] = text.split(/\s+/)
    if (instruction.toUpperCase() !== 'FROM') continue

    const words = rest.filter((word) => !word.startsWith('--'))
    if (words.length === 1) {
      stages.push({ image: words[0], line })
    } else if (words.length === 3 && words[1].toUpperCase() === 'AS') {
      stages.push({ image: words[0], alias: words[2], line })
    } else {
      throw new InvalidBuildDeclarationError(
        `Unparseable FROM instruction on line ${line} of the Dockerfile: ${text}`,
        'dockerfile'
      )
    }
  }

  if (stages.length === 0) {
    throw new InvalidBuildDeclarationError(
      'The Dockerfile has no FROM instruction',
      'dockerfile'
    )
  }
  return stages
}

/**
 * Returns the image the final stage is built on, or `null` when it cannot
 * be known from the Dockerfile alone: the final stage starts from an
 * earlier named stage, from `scratch`, or from a build argument.
 */
export function finalBaseImage(stages: DockerfileStage[]): string | null {
  const final = stages[stages.length - 1]
  if (!final) return null

  const image = final.image
  const earlierAliases = stages
    .slice(0, -1)
    .map((stage) => stage.alias?.toLowerCase())
  if (earlierAliases.includes(image.toLowerCase())) return null
  if (image.toLowerCase() === 'scratch') return null
  if (image.includes('$')) return null

  return image
}

/**
 * Yields instructions with `\` continuations joined, skipping blank and
 * comment lines.
 */
function* logicalLines(
  dockerfile: string
): Generator<{ text: string; line: number }> {
  const physical = dockerfile.split(/\r?\n/)
  let pending = ''
  let startLine = 0

  for (let i = 0; i < physical.length; i++) {
    const trimmed = physical[i].trim()
    if (!pending && (!trimmed || trimmed.startsWith('#'))) continue
    if (pending && trimmed.startsWith('#')) continue

    if (!pending) startLine = i + 1
    if (trimmed.endsWith('\\')) {
      pending += trimmed.slice(0, -1).trim() + ' '
      continue
    }

    const text = (pending + trimmed).trim()
    pending = ''
    if (text) yield { text, line: startLine }
  }

  if (pending.trim()) yield { text: pending.trim(), line: startLine }
}
