import * as core from '@actions/core'
import { ClusterAccessor, CommandRunner, execaRunner } from './cluster-accessor.js'
import { ActionConfig, readConfig } from './config.js'
import { parseBuildDeclaration, resolveDeclaration } from './declaration.js'
import { describeExternalDockerTag, parseDockerTag } from './docker-tag.js'
import { describeRef } from './errors.js'
import { GitHubPRCommenter } from './github-pr-commenter.js'
import { reconcileImageStream } from './imagestream-synthesizer.js'
import { Reconciler } from './reconciler.js'
import { ReconcileResult } from './types.js'

/**
 * Entry point of the action. Every failure ends up in `core.setFailed`.
 *
 * @param runner - Runs the `oc` processes; tests substitute a fake cluster
 */
export async function run(runner: CommandRunner = execaRunner): Promise<void> {
  try {
    const config = readConfig()

    if (config.operation === 'parse-docker-tag') {
      parseImageInput(config)
      return
    }

    const reconciler = new Reconciler(
      new ClusterAccessor(config.cluster, runner),
      config.cluster
    )

    let results: ReconcileResult[]
    if (config.operation === 'imagestream') {
      results = await runImageStream(reconciler, config)
      core.setOutput('result', JSON.stringify(results))
    } else {
      const result = await runObject(reconciler, config)
      results = [result]
      core.setOutput('result', JSON.stringify(result))
    }
    core.setOutput('changed', String(results.some((result) => result.changed)))

    const commenter = new GitHubPRCommenter(
      config.report.githubToken,
      config.report.title,
      config.report.subtitle,
      config.report.maxCommentLength
    )
    await commenter.report(results)
  } catch (error) {
    core.setFailed(`Action failed with error: ${error}`)
  }
}

async function runObject(
  reconciler: Reconciler,
  config: ActionConfig
): Promise<ReconcileResult> {
  if (!config.content) {
    throw new Error('Input "content" is required for operation "object"')
  }

  const declaration = resolveDeclaration({
    state: config.state,
    kind: config.kind,
    name: config.name,
    namespace: config.namespace,
    source: { type: 'raw', text: config.content }
  })

  core.startGroup(`Reconciling ${describeRef(declaration.ref)}`)
  try {
    return await reconciler.reconcile(declaration)
  } finally {
    core.endGroup()
  }
}

async function runImageStream(
  reconciler: Reconciler,
  config: ActionConfig
): Promise<ReconcileResult[]> {
  if (!config.declaration) {
    throw new Error('Input "declaration" is required for operation "imagestream"')
  }

  const declaration = parseBuildDeclaration(config.declaration, {
    name: config.name,
    namespace: config.namespace,
    state: config.state
  })

  core.startGroup(`Reconciling ImageStream ${declaration.namespace}/${declaration.name}`)
  try {
    return await reconcileImageStream(reconciler, declaration, config.cluster)
  } finally {
    core.endGroup()
  }
}

function parseImageInput(config: ActionConfig): void {
  if (!config.image) {
    throw new Error('Input "image" is required for operation "parse-docker-tag"')
  }

  const parsed = {
    ...parseDockerTag(config.image),
    ...describeExternalDockerTag(config.image, config.mirroredBase)
  }
  core.info(`Parsed ${config.image} as ${parsed.qualified}`)
  core.setOutput('parsed', JSON.stringify(parsed))
  core.setOutput('changed', 'false')
}
