/**
 * In-memory stand-in for the `oc` command line: understands the `get`,
 * `create`, `apply` (also as a server-side dry-run) and `delete` invocations
 * ClusterAccessor makes and keeps the objects in a map.
 */
import * as yaml from 'js-yaml'
import { CommandResult, CommandRunner } from '../src/cluster-accessor.js'
import { deepMerge, isDocumentMap, parseDocuments } from '../src/document.js'
import { Document, DocumentMap } from '../src/types.js'

export interface RecordedCall {
  verb: string
  /** Every argument after the binary name */
  args: string[]
  input?: string
  dryRun: boolean
}

export class FakeCluster implements CommandRunner {
  readonly calls: RecordedCall[] = []

  /** Runs on every written object, dry-runs included, like an admission webhook */
  admission: (object: DocumentMap) => DocumentMap = (object) => object

  /** Rewrites objects once they are stored, like a controller racing the action */
  controller: (object: DocumentMap) => DocumentMap = (object) => object

  private readonly objects = new Map<string, DocumentMap>()
  private readonly failures = new Map<string, CommandResult>()
  private revision = 0

  /**
   * Stores an object as if it had been created earlier.
   */
  seed(object: DocumentMap): DocumentMap {
    return this.store(object, undefined, undefined)
  }

  lookup(kind: string, name: string, namespace?: string): DocumentMap | undefined {
    return this.objects.get(key(kind, name, namespace))
  }

  /**
   * Makes the next invocation of `verb` exit with the given result.
   * A dry-run is addressed as `apply --dry-run`.
   */
  failNext(verb: string, exitCode: number, stderr: string): void {
    this.failures.set(verb, { exitCode, stdout: '', stderr })
  }

  verbs(): string[] {
    return this.calls.map(label)
  }

  async run(_file: string, args: string[], input?: string): Promise<CommandResult> {
    const positional: string[] = []
    let namespace: string | undefined
    let dryRun = false
    for (let i = 0; i < args.length; i++) {
      const arg = args[i]
      if (arg === '--dry-run=server') {
        dryRun = true
      } else if (arg === '-n') {
        namespace = args[++i]
      } else if (arg === '-o' || arg === '-f') {
        i++
      } else if (!arg.startsWith('--')) {
        positional.push(arg)
      }
    }

    const [verb, kind, name] = positional
    const call: RecordedCall = { verb, args, input, dryRun }
    this.calls.push(call)

    const failure = this.failures.get(label(call))
    if (failure) {
      this.failures.delete(label(call))
      return failure
    }

    switch (verb) {
      case 'get':
        return this.get(kind, name, namespace)
      case 'create':
        return this.create(input, namespace)
      case 'apply':
        return dryRun ? this.dryRunApply(input, namespace) : this.apply(input, namespace)
      case 'delete':
        return this.delete(kind, name, namespace)
      default:
        return { exitCode: 1, stdout: '', stderr: `error: unknown command "${verb}"` }
    }
  }

  private get(kind: string, name: string, namespace?: string): CommandResult {
    const object = this.lookup(kind, name, namespace)
    if (!object) {
      return notFound(kind, name)
    }
    return { exitCode: 0, stdout: yaml.dump(object), stderr: '' }
  }

  private create(input: string | undefined, namespace?: string): CommandResult {
    const document = parseInput(input)
    const { kind, name } = identity(document)
    if (this.lookup(kind, name, namespace ?? namespaceOf(document))) {
      return {
        exitCode: 1,
        stdout: '',
        stderr: `Error from server (AlreadyExists): ${kind} "${name}" already exists`
      }
    }
    this.store(document, namespace, undefined)
    return { exitCode: 0, stdout: `${kind.toLowerCase()}/${name} created`, stderr: '' }
  }

  private apply(input: string | undefined, namespace?: string): CommandResult {
    const document = parseInput(input)
    const { kind, name } = identity(document)
    const existing = this.lookup(kind, name, namespace ?? namespaceOf(document))
    if (!existing) {
      this.store(document, namespace, undefined)
      return { exitCode: 0, stdout: `${kind.toLowerCase()}/${name} created`, stderr: '' }
    }

    const expected = metadataOf(document).resourceVersion
    if (expected !== undefined && expected !== metadataOf(existing).resourceVersion) {
      return {
        exitCode: 1,
        stdout: '',
        stderr: `Error from server (Conflict): the object has been modified; please apply your changes to the latest version and try again`
      }
    }

    this.store(deepMerge(existing, document), namespace, existing)
    return { exitCode: 0, stdout: `${kind.toLowerCase()}/${name} configured`, stderr: '' }
  }

  /**
   * Shows what `apply` would store, without storing it.
   */
  private dryRunApply(input: string | undefined, namespace?: string): CommandResult {
    const document = parseInput(input)
    const { kind, name } = identity(document)
    const existing = this.lookup(kind, name, namespace ?? namespaceOf(document))
    const merged = existing ? deepMerge(existing, document) : document
    const resourceVersion = existing ? metadataOf(existing).resourceVersion : undefined
    const object = this.admit(merged, namespace, existing, resourceVersion)
    return { exitCode: 0, stdout: yaml.dump(object), stderr: '' }
  }

  private delete(kind: string, name: string, namespace?: string): CommandResult {
    const k = key(kind, name, namespace)
    if (!this.objects.has(k)) {
      return notFound(kind, name)
    }
    this.objects.delete(k)
    return { exitCode: 0, stdout: `${kind.toLowerCase()} "${name}" deleted`, stderr: '' }
  }

  private store(
    document: DocumentMap,
    namespace: string | undefined,
    previous: DocumentMap | undefined
  ): DocumentMap {
    const { kind, name } = identity(document)
    this.revision++

    const stored = this.controller(
      this.admit(document, namespace, previous, String(this.revision))
    )
    this.objects.set(key(kind, name, namespace ?? namespaceOf(document)), stored)
    return stored
  }

  private admit(
    document: DocumentMap,
    namespace: string | undefined,
    previous: DocumentMap | undefined,
    resourceVersion: Document | undefined
  ): DocumentMap {
    const ns = namespace ?? namespaceOf(document)
    return this.admission({
      ...document,
      metadata: {
        ...metadataOf(document),
        ...(ns ? { namespace: ns } : {}),
        uid: previous ? metadataOf(previous).uid : `uid-${this.revision}`,
        ...(resourceVersion === undefined ? {} : { resourceVersion }),
        creationTimestamp: previous
          ? metadataOf(previous).creationTimestamp
          : '2024-01-01T00:00:00Z'
      },
      status: isDocumentMap(document.status) ? document.status : {}
    })
  }
}

function label(call: RecordedCall): string {
  return call.dryRun ? `${call.verb} --dry-run` : call.verb
}

function key(kind: string, name: string, namespace?: string): string {
  return `${kind.toLowerCase()}/${namespace ?? ''}/${name}`
}

function notFound(kind: string, name: string): CommandResult {
  return {
    exitCode: 1,
    stdout: '',
    stderr: `Error from server (NotFound): ${kind.toLowerCase()} "${name}" not found`
  }
}

function parseInput(input: string | undefined): DocumentMap {
  const [document] = parseDocuments(input ?? '')
  if (!isDocumentMap(document)) {
    throw new Error('fake cluster: expected an object on stdin')
  }
  return document
}

function metadataOf(document: DocumentMap): DocumentMap {
  return isDocumentMap(document.metadata) ? document.metadata : {}
}

function namespaceOf(document: DocumentMap): string | undefined {
  const namespace = metadataOf(document).namespace
  return typeof namespace === 'string' ? namespace : undefined
}

function identity(document: DocumentMap): { kind: string; name: string } {
  const name = metadataOf(document).name
  if (typeof document.kind !== 'string' || typeof name !== 'string') {
    throw new Error('fake cluster: object without kind or name')
  }
  return { kind: document.kind, name }
}
