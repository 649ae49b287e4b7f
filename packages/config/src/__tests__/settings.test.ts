import { describe, it, expect } from 'vitest'
import {
  DEFAULT_SETTINGS,
  SETTING_ENV_KEYS,
  readEnvNumber,
  readEnvNumberList,
  resolveSettings,
} from '../index'

describe('resolveSettings', () => {
  it('falls back to defaults with an empty environment', () => {
    expect(resolveSettings({})).toEqual(DEFAULT_SETTINGS)
  })

  it('applies environment overrides', () => {
    expect(
      resolveSettings({
        SCHEDSIM_DEFAULT_QUANTUM: '0.5',
        SCHEDSIM_MIN_QUANTUM: '0.25',
        SCHEDSIM_COMPARE_QUANTA: '1, 3,5',
        SCHEDSIM_MAX_PROCESSES: '50',
        SCHEDSIM_MAX_TOTAL_BURST: '250',
      }),
    ).toEqual({
      defaultTimeQuantum: 0.5,
      minTimeQuantum: 0.25,
      compareQuanta: [1, 3, 5],
      maxProcesses: 50,
      maxTotalBurst: 250,
    })
  })

  it('ignores values it cannot use', () => {
    expect(
      resolveSettings({
        SCHEDSIM_DEFAULT_QUANTUM: '-2',
        SCHEDSIM_MIN_QUANTUM: 'tiny',
        SCHEDSIM_COMPARE_QUANTA: '2,abc',
        SCHEDSIM_MAX_PROCESSES: '12.5',
        SCHEDSIM_MAX_TOTAL_BURST: '',
      }),
    ).toEqual(DEFAULT_SETTINGS)
  })

  it('does not share the default quanta array', () => {
    const resolved = resolveSettings({})
    resolved.compareQuanta.push(8)
    expect(DEFAULT_SETTINGS.compareQuanta).toEqual([2, 4])
  })
})

describe('env readers', () => {
  it('reads positive numbers only', () => {
    expect(readEnvNumber({ X: '3' }, 'X')).toBe(3)
    expect(readEnvNumber({ X: '0' }, 'X')).toBeUndefined()
    expect(readEnvNumber({ X: 'Infinity' }, 'X')).toBeUndefined()
    expect(readEnvNumber({}, 'X')).toBeUndefined()
  })

  it('reads comma lists', () => {
    expect(readEnvNumberList({ Q: '2,4' }, 'Q')).toEqual([2, 4])
    expect(readEnvNumberList({ Q: '2,,4' }, 'Q')).toBeUndefined()
  })

  it('names an env key for every setting', () => {
    expect(Object.keys(SETTING_ENV_KEYS).sort()).toEqual(Object.keys(DEFAULT_SETTINGS).sort())
  })
})
