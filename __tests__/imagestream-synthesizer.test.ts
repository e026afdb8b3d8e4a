import { jest } from '@jest/globals'
import * as fc from 'fast-check'
import * as core from '../__fixtures__/core.js'
import { FakeCluster } from '../__fixtures__/fake-cluster.js'
import { ClusterAccessor } from '../src/cluster-accessor.js'
import { DEFAULT_CLUSTER_CONFIG } from '../src/config.js'
import { REGISTRY } from '../src/constants.js'
import { isDocumentMap } from '../src/document.js'
import { InvalidBuildDeclarationError } from '../src/errors.js'
import {
  implicitLocalFrom,
  normalizeFrom,
  reconcileImageStream,
  synthesize,
  SynthesizerConfig
} from '../src/imagestream-synthesizer.js'
import { Reconciler } from '../src/reconciler.js'
import { BuildDeclaration, DocumentMap } from '../src/types.js'

jest.mock('@actions/core', () =>
  jest.requireActual<typeof import('../__fixtures__/core.js')>('../__fixtures__/core')
)

const config: SynthesizerConfig = { localRegistries: REGISTRY.DEFAULT_LOCAL_REGISTRIES }

const MIRROR: BuildDeclaration = {
  name: 'awx',
  namespace: 'wwp-test',
  tag: '22.x',
  from: 'docker-registry.default.svc:5000/wwp-test/awx:22.4.0'
}

const LOCAL_BASE_DOCKERFILE =
  'FROM docker-registry.default.svc:5000/wwp-test/awx:22.x\nRUN npm ci\n'

describe('synthesize', () => {
  describe('mirroring', () => {
    it('should import the image through the local registry', () => {
      expect(synthesize(MIRROR, config)).toEqual({
        imageStream: {
          apiVersion: 'image.openshift.io/v1',
          kind: 'ImageStream',
          metadata: { name: 'awx', namespace: 'wwp-test' },
          spec: {
            tags: [
              {
                name: '22.x',
                from: {
                  kind: 'DockerImage',
                  name: 'docker-registry.default.svc:5000/wwp-test/awx:22.4.0'
                },
                referencePolicy: { type: 'Local' },
                importPolicy: { scheduled: true }
              }
            ]
          }
        },
        buildConfig: null
      })
    })

    it('should not schedule imports of another ImageStream', () => {
      const { imageStream } = synthesize(
        { name: 'awx', namespace: 'wwp-test', from: 'awx-upstream:22.x' },
        config
      )

      expect(imageStream.spec).toEqual({
        tags: [
          {
            name: 'latest',
            from: { kind: 'ImageStreamTag', name: 'awx-upstream:22.x', namespace: 'wwp-test' },
            referencePolicy: { type: 'Local' }
          }
        ]
      })
    })

    it('should declare a bare ImageStream without `from`', () => {
      expect(synthesize({ name: 'awx', namespace: 'wwp-test' }, config)).toEqual({
        imageStream: {
          apiVersion: 'image.openshift.io/v1',
          kind: 'ImageStream',
          metadata: { name: 'awx', namespace: 'wwp-test' }
        },
        buildConfig: null
      })
    })

    it('should reject `spec` overrides', () => {
      expect(() => synthesize({ ...MIRROR, spec: { runPolicy: 'Serial' } }, config)).toThrow(
        InvalidBuildDeclarationError
      )
    })
  })

  describe('building', () => {
    it('should build on the ImageStreamTag behind a local base image', () => {
      const { imageStream, buildConfig } = synthesize(
        { name: 'awx-custom', namespace: 'wwp-test', dockerfile: LOCAL_BASE_DOCKERFILE },
        config
      )

      expect(imageStream).toEqual({
        apiVersion: 'image.openshift.io/v1',
        kind: 'ImageStream',
        metadata: { name: 'awx-custom', namespace: 'wwp-test' }
      })
      expect(buildConfig).toEqual({
        apiVersion: 'build.openshift.io/v1',
        kind: 'BuildConfig',
        metadata: { name: 'awx-custom', namespace: 'wwp-test' },
        spec: {
          source: { type: 'Dockerfile', dockerfile: LOCAL_BASE_DOCKERFILE },
          output: { to: { kind: 'ImageStreamTag', name: 'awx-custom:latest' } },
          strategy: {
            type: 'Docker',
            dockerStrategy: {
              forcePull: true,
              from: { kind: 'ImageStreamTag', name: 'awx:22.x', namespace: 'wwp-test' }
            }
          },
          triggers: [{ type: 'ImageChange' }]
        }
      })
    })

    it('should leave a public base image to the Dockerfile', () => {
      const { buildConfig } = synthesize(
        { name: 'tool', namespace: 'ci', dockerfile: 'FROM node:20\n' },
        config
      )

      expect(buildConfig?.spec).toMatchObject({
        strategy: { type: 'Docker', dockerStrategy: { forcePull: true } },
        triggers: []
      })
      expect(buildConfig?.spec).not.toHaveProperty('strategy.dockerStrategy.from')
      expect(buildConfig?.spec).not.toHaveProperty('strategy.dockerStrategy.noCache')
    })

    it('should not derive a base image when the overrides name one', () => {
      const { buildConfig } = synthesize(
        {
          name: 'awx-custom',
          namespace: 'wwp-test',
          dockerfile: LOCAL_BASE_DOCKERFILE,
          from: null,
          spec: {
            strategy: {
              dockerStrategy: { from: { kind: 'DockerImage', name: 'quay.io/org/base:1' } }
            }
          }
        },
        config
      )

      expect(buildConfig?.spec).toMatchObject({
        strategy: {
          type: 'Docker',
          dockerStrategy: {
            forcePull: true,
            from: { kind: 'DockerImage', name: 'quay.io/org/base:1' }
          }
        },
        triggers: []
      })
    })

    it('should build a Git repository on an explicit ImageStream', () => {
      const { buildConfig } = synthesize(
        {
          name: 'app',
          namespace: 'team-a',
          tag: 'v2',
          from: 'base:1.0',
          git: { repository: 'https://git.example.com/app.git', ref: 'main', path: 'docker' }
        },
        config
      )

      expect(buildConfig?.spec).toEqual({
        source: {
          type: 'Git',
          git: { uri: 'https://git.example.com/app.git', ref: 'main' },
          contextDir: 'docker'
        },
        output: { to: { kind: 'ImageStreamTag', name: 'app:v2' } },
        strategy: {
          type: 'Docker',
          dockerStrategy: {
            forcePull: true,
            from: { kind: 'ImageStreamTag', name: 'base:1.0', namespace: 'team-a' }
          }
        },
        triggers: [{ type: 'ImageChange' }]
      })
    })

    it('should not trigger on an external base image', () => {
      const { buildConfig } = synthesize(
        {
          name: 'app',
          namespace: 'team-a',
          from: 'quay.io/org/base:1',
          git: { repository: 'https://git.example.com/app.git' }
        },
        config
      )

      expect(buildConfig?.spec).toHaveProperty('triggers', [])
    })

    it('should keep the declared triggers and add the ImageChange trigger once', () => {
      const declaration: BuildDeclaration = {
        name: 'awx-custom',
        namespace: 'wwp-test',
        dockerfile: LOCAL_BASE_DOCKERFILE,
        triggers: [{ type: 'ConfigChange' }]
      }

      expect(synthesize(declaration, config).buildConfig?.spec).toHaveProperty('triggers', [
        { type: 'ConfigChange' },
        { type: 'ImageChange' }
      ])
      expect(
        synthesize({ ...declaration, triggers: [{ type: 'ImageChange' }] }, config).buildConfig
          ?.spec
      ).toHaveProperty('triggers', [{ type: 'ImageChange' }])
    })

    it('should merge `spec` overrides over the synthesized spec', () => {
      const { buildConfig } = synthesize(
        {
          name: 'tool',
          namespace: 'ci',
          dockerfile: 'FROM node:20\n',
          spec: {
            runPolicy: 'Serial',
            strategy: { dockerStrategy: { noCache: true } }
          }
        },
        config
      )

      expect(buildConfig?.spec).toMatchObject({
        runPolicy: 'Serial',
        strategy: { type: 'Docker', dockerStrategy: { noCache: true, forcePull: true } }
      })
    })

    it('should label both objects', () => {
      const { imageStream, buildConfig } = synthesize(
        {
          name: 'tool',
          namespace: 'ci',
          metadata: { labels: { team: 'ci' } },
          dockerfile: 'FROM node:20\n'
        },
        config
      )

      expect(imageStream.metadata).toEqual({ labels: { team: 'ci' }, name: 'tool', namespace: 'ci' })
      expect(buildConfig?.metadata).toEqual({ labels: { team: 'ci' }, name: 'tool', namespace: 'ci' })
    })
  })

  describe('field independence', () => {
    const optionalInputs = fc.record({
      from: fc.constantFrom(undefined, null, ''),
      tag: fc.option(fc.constantFrom('1.0', 'v2', 'stable'), { nil: undefined }),
      labels: fc.option(fc.dictionary(fc.constantFrom('app', 'team'), fc.string()), {
        nil: undefined
      }),
      triggers: fc.option(fc.constant([{ type: 'ConfigChange' }]), { nil: undefined }),
      dockerStrategy: fc.option(
        fc.record({ noCache: fc.boolean(), env: fc.constant([{ name: 'A', value: '1' }]) }),
        { nil: undefined }
      )
    })

    it('should build the strategy from the overrides alone when `from` is absent', () => {
      fc.assert(
        fc.property(optionalInputs, ({ from, tag, labels, triggers, dockerStrategy }) => {
          const declaration: BuildDeclaration = {
            name: 'tool',
            namespace: 'ci',
            dockerfile: 'FROM node:20\n',
            from
          }
          if (tag) declaration.tag = tag
          if (labels) declaration.metadata = { labels }
          if (triggers) declaration.triggers = triggers
          if (dockerStrategy) declaration.spec = { strategy: { dockerStrategy } }

          const { buildConfig } = synthesize(declaration, config)

          expect(buildConfig?.spec).toHaveProperty('strategy', {
            type: 'Docker',
            dockerStrategy: { forcePull: true, ...dockerStrategy }
          })
          expect(buildConfig?.spec).toHaveProperty('triggers', triggers ?? [])
          expect(buildConfig?.spec).toHaveProperty('output', {
            to: { kind: 'ImageStreamTag', name: `tool:${tag ?? 'latest'}` }
          })
        }),
        { numRuns: 100 }
      )
    })
  })

  describe('validation', () => {
    it.each<[string, BuildDeclaration, string]>([
      ['name', { name: '', namespace: 'ci' }, 'Missing field `name`'],
      ['namespace', { name: 'tool', namespace: '' }, 'Missing field `namespace`'],
      [
        'both sources',
        {
          name: 'tool',
          namespace: 'ci',
          dockerfile: 'FROM node:20\n',
          git: { repository: 'https://git.example.com/app.git' }
        },
        'Set either `dockerfile` or `git`, not both'
      ],
      [
        'an empty Dockerfile',
        { name: 'tool', namespace: 'ci', dockerfile: '  \n' },
        '`dockerfile` must be the non-empty text of a Dockerfile'
      ],
      [
        'a Git source without repository',
        { name: 'tool', namespace: 'ci', git: { repository: '' } },
        'Missing field `repository` under `git`'
      ]
    ])('should reject a declaration with %s', (_, declaration, message) => {
      expect(() => synthesize(declaration, config)).toThrow(message)
    })
  })
})

describe('normalizeFrom', () => {
  it('should read an external image', () => {
    expect(normalizeFrom('quay.io/org/base:1', 'ci')).toEqual({
      kind: 'DockerImage',
      name: 'quay.io/org/base:1'
    })
  })

  it('should read a stream of the same namespace', () => {
    expect(normalizeFrom('base', 'ci')).toEqual({
      kind: 'ImageStreamTag',
      name: 'base:latest',
      namespace: 'ci'
    })
  })

  it('should take a structured reference as is', () => {
    const from = { kind: 'ImageStreamTag', name: 'base:1', namespace: 'shared' }

    expect(normalizeFrom(from, 'ci')).toBe(from)
  })

  it('should treat an empty value as absent', () => {
    expect(normalizeFrom(undefined, 'ci')).toBeNull()
    expect(normalizeFrom(null, 'ci')).toBeNull()
    expect(normalizeFrom('', 'ci')).toBeNull()
  })

  it('should reject what it cannot read', () => {
    expect(() => normalizeFrom('a:b:c', 'ci')).toThrow(
      'Cannot read `from: a:b:c` as an ImageStream name and tag'
    )
    expect(() => normalizeFrom({ kind: 'ImageStreamTag', name: '' }, 'ci')).toThrow(
      'A structured `from` needs both `kind` and `name`'
    )
  })
})

describe('implicitLocalFrom', () => {
  it('should honour the configured registries', () => {
    const dockerfile = 'FROM registry.internal.example:5000/shared/base:2\n'

    expect(implicitLocalFrom(dockerfile, config)).toBeNull()
    expect(
      implicitLocalFrom(dockerfile, { localRegistries: ['registry.internal.example:5000'] })
    ).toEqual({ kind: 'ImageStreamTag', name: 'base:2', namespace: 'shared' })
  })

  it('should look at the final stage only', () => {
    const dockerfile =
      'FROM docker-registry.default.svc:5000/wwp-test/awx:22.x AS base\nFROM node:20\n'

    expect(implicitLocalFrom(dockerfile, config)).toBeNull()
  })

  it('should warn about a local image it cannot map', () => {
    const dockerfile = `FROM image-registry.openshift-image-registry.svc:5000/wwp-test/awx@sha256:${'d'.repeat(64)}\n`

    expect(implicitLocalFrom(dockerfile, config)).toBeNull()
    expect(core.warning).toHaveBeenCalledTimes(1)
  })

  it('should reject an invalid image on the final FROM line', () => {
    expect(() => implicitLocalFrom('FROM ubuntu:\n', config)).toThrow(
      'The Dockerfile\'s final FROM line has an invalid image: Invalid image reference "ubuntu:": empty tag'
    )
  })
})

describe('reconcileImageStream', () => {
  let cluster: FakeCluster
  let reconciler: Reconciler

  beforeEach(() => {
    cluster = new FakeCluster()
    reconciler = new Reconciler(new ClusterAccessor(DEFAULT_CLUSTER_CONFIG, cluster), {
      force: false,
      checkMode: false
    })
  })

  it('should create a mirror and leave it alone on the next run', async () => {
    const first = await reconcileImageStream(reconciler, MIRROR, config)
    const second = await reconcileImageStream(reconciler, MIRROR, config)

    expect(first.map((result) => [result.ref.kind, result.operation])).toEqual([
      ['ImageStream', 'create']
    ])
    expect(second.map((result) => result.changed)).toEqual([false])
    expect(cluster.lookup('BuildConfig', 'awx', 'wwp-test')).toBeUndefined()
  })

  it('should create the ImageStream before the BuildConfig', async () => {
    const declaration: BuildDeclaration = {
      name: 'awx-custom',
      namespace: 'wwp-test',
      dockerfile: LOCAL_BASE_DOCKERFILE
    }

    const results = await reconcileImageStream(reconciler, declaration, config)
    const again = await reconcileImageStream(reconciler, declaration, config)

    expect(results.map((result) => result.ref.kind)).toEqual(['ImageStream', 'BuildConfig'])
    expect(results.every((result) => result.operation === 'create')).toBe(true)
    expect(again.some((result) => result.changed)).toBe(false)
  })

  describe('against a server that leaves out a false noCache', () => {
    beforeEach(() => {
      cluster.admission = (object) => {
        const spec = object.spec
        const strategy = isDocumentMap(spec) ? spec.strategy : undefined
        const dockerStrategy = isDocumentMap(strategy) ? strategy.dockerStrategy : undefined
        if (
          !isDocumentMap(spec) ||
          !isDocumentMap(strategy) ||
          !isDocumentMap(dockerStrategy) ||
          dockerStrategy.noCache !== false
        ) {
          return object
        }
        const kept: DocumentMap = { ...dockerStrategy }
        delete kept.noCache
        return { ...object, spec: { ...spec, strategy: { ...strategy, dockerStrategy: kept } } }
      }
    })

    it('should build and then leave the BuildConfig alone', async () => {
      const declaration: BuildDeclaration = {
        name: 'tool',
        namespace: 'ci',
        dockerfile: 'FROM node:20\n'
      }

      const first = await reconcileImageStream(reconciler, declaration, DEFAULT_CLUSTER_CONFIG)
      const second = await reconcileImageStream(reconciler, declaration, DEFAULT_CLUSTER_CONFIG)

      expect(first.map((result) => result.operation)).toEqual(['create', 'create'])
      expect(second.map((result) => result.changed)).toEqual([false, false])
    })

    it('should converge on an explicit noCache: false', async () => {
      const declaration: BuildDeclaration = {
        name: 'tool',
        namespace: 'ci',
        dockerfile: 'FROM node:20\n',
        spec: { strategy: { dockerStrategy: { noCache: false } } }
      }

      const first = await reconcileImageStream(reconciler, declaration, DEFAULT_CLUSTER_CONFIG)
      const second = await reconcileImageStream(reconciler, declaration, DEFAULT_CLUSTER_CONFIG)

      expect(first.map((result) => result.changed)).toEqual([true, true])
      expect(second.map((result) => result.changed)).toEqual([false, false])
      expect(cluster.lookup('BuildConfig', 'tool', 'ci')?.spec).toHaveProperty(
        'strategy.dockerStrategy',
        { forcePull: true }
      )
    })
  })

  it('should delete the BuildConfig before the ImageStream', async () => {
    const declaration: BuildDeclaration = {
      name: 'awx-custom',
      namespace: 'wwp-test',
      dockerfile: LOCAL_BASE_DOCKERFILE
    }
    await reconcileImageStream(reconciler, declaration, config)
    cluster.calls.length = 0

    const results = await reconcileImageStream(
      reconciler,
      { ...declaration, state: 'absent' },
      config
    )

    expect(
      cluster.calls.filter((call) => call.verb === 'delete').map((call) => call.args[1])
    ).toEqual(['BuildConfig', 'ImageStream'])
    expect(results.map((result) => result.operation)).toEqual(['delete', 'delete'])
  })
})
