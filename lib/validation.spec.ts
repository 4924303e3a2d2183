import * as curing from './curing'
import { BCM_ERROR, collectCalculationInput, resolveVolume, validateBcm } from './validation'

const HEX = 'Hexagonal (20-30% transfer)'
const GTT = 'GTT UniCoat (25-30% transfer)'

afterEach(() => {
  jest.restoreAllMocks()
})

describe('validateBcm', () => {
  it('accepts 0 < bcm <= 20', () => {
    expect(validateBcm(0.01)).toBe(true)
    expect(validateBcm(20)).toBe(true)
  })

  it('rejects values outside the range', () => {
    expect(validateBcm(0)).toBe(false)
    expect(validateBcm(20.01)).toBe(false)
    expect(validateBcm(-1)).toBe(false)
    expect(validateBcm(Number.NaN)).toBe(false)
  })
})

describe('resolveVolume', () => {
  it('keeps a label the roller offers', () => {
    expect(resolveVolume(HEX, '13 cm³/m²')).toBe('13 cm³/m²')
  })

  it('falls back to the smallest volume', () => {
    expect(resolveVolume(GTT, '10 cm³/m²')).toBe('S')
    expect(resolveVolume(HEX)).toBe('7 cm³/m²')
  })

  it('gives nothing for an unknown roller', () => {
    expect(resolveVolume('Unknown', 'S')).toBeUndefined()
  })
})

describe('collectCalculationInput', () => {
  it('derives the BCM from the volume', () => {
    expect(collectCalculationInput({
      substrate: 'Gecoat papier', inkType: 'UV-inkt', rollerType: HEX, volume: '10 cm³/m²',
    })).toEqual({
      valid: true,
      value: { substrate: 'Gecoat papier', inkType: 'UV-inkt', rollerType: HEX, volume: '10 cm³/m²', bcm: 6.4 },
    })
  })

  it('resolves a volume left over from another roller type', () => {
    const r = collectCalculationInput({ substrate: 'Folie', inkType: 'UV-inkt', rollerType: GTT, volume: '10 cm³/m²' })
    expect(r).toEqual({
      valid: true,
      value: { substrate: 'Folie', inkType: 'UV-inkt', rollerType: GTT, volume: 'S', bcm: 4.5 },
    })
  })

  it('rejects unknown selections', () => {
    expect(collectCalculationInput({ substrate: 'Plastic', inkType: 'UV-inkt', rollerType: HEX }))
        .toEqual({ valid: false, error: 'Onbekend substraat: "Plastic"' })
    expect(collectCalculationInput({ substrate: 'Folie', inkType: 'Toner', rollerType: HEX }))
        .toEqual({ valid: false, error: 'Onbekende inktsoort: "Toner"' })
    expect(collectCalculationInput({ substrate: 'Folie', inkType: 'UV-inkt' }))
        .toEqual({ valid: false, error: 'Onbekend rasterwals type: ""' })
  })

  it('rejects a BCM outside the range before calculating', () => {
    const form = { substrate: 'Folie', inkType: 'UV-inkt', rollerType: HEX, volume: '10 cm³/m²' }

    jest.spyOn(curing, 'getBcmFromVolume').mockReturnValue(20.01)
    expect(collectCalculationInput(form)).toEqual({ valid: false, error: BCM_ERROR })

    jest.spyOn(curing, 'getBcmFromVolume').mockReturnValue(0)
    expect(collectCalculationInput(form)).toEqual({ valid: false, error: BCM_ERROR })

    jest.spyOn(curing, 'getBcmFromVolume').mockReturnValue(20)
    expect(collectCalculationInput(form)).toMatchObject({ valid: true, value: { bcm: 20 } })
  })
})
