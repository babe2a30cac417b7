import { describe, expect, it } from 'vitest'

import { CorrectionPolicy } from '../src/core/corrections'
import { InvalidBuilderStateError } from '../src/errors'

describe('CorrectionPolicy', () => {
  it('starts with every correction disabled', () => {
    const policy = new CorrectionPolicy(['length', 'checksum'])
    expect(policy.lengthAtBuild).toBe(false)
    expect(policy.checksumAtBuild).toBe(false)
  })

  it('toggles supported corrections', () => {
    const policy = new CorrectionPolicy(['length', 'checksum'])
    policy.set('length', true)
    policy.set('checksum', true)
    expect(policy.lengthAtBuild).toBe(true)
    expect(policy.checksumAtBuild).toBe(true)

    policy.set('length', false)
    expect(policy.lengthAtBuild).toBe(false)
    expect(policy.checksumAtBuild).toBe(true)
  })

  it('rejects enabling a correction the builder does not support', () => {
    const policy = new CorrectionPolicy(['length'])
    expect(policy.supports('checksum')).toBe(false)
    expect(() => policy.set('checksum', true)).toThrowError(InvalidBuilderStateError)
    expect(() => policy.set('checksum', true)).toThrowError(
      'This builder cannot correct checksum at build time',
    )
    expect(() => policy.set('checksum', false)).not.toThrow()
  })

  it('disables everything at once', () => {
    const policy = new CorrectionPolicy(['length', 'checksum'])
    policy.set('length', true)
    policy.set('checksum', true)
    policy.disableAll()
    expect(policy.lengthAtBuild).toBe(false)
    expect(policy.checksumAtBuild).toBe(false)
  })
})
