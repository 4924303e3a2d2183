// lib/types.ts

// -----------------------------
// Core enums / unions
// -----------------------------

export type Substrate =
    | 'Gecoat papier'
    | 'Ongecoat papier'
    | 'Folie'
    | 'Karton'

export type InkType = 'UV-inkt' | 'Watergedragen inkt' | 'LED-UV inkt'

// Label carries the nominal transfer range, as printed on the roller spec sheet
export type RollerType =
    | 'Hexagonal (20-30% transfer)'
    | 'Hachure / Trihelical (35-40% transfer)'
    | 'ART / TIF (40-50% transfer)'
    | 'GTT UniCoat (25-30% transfer)'

// Fractional ink-transfer efficiency, [low, high]
export type TransferRange = readonly [low: number, high: number]

// -----------------------------
// Roller models
// -----------------------------

export type VolumeSpec = {
  volume: string        // "10 cm³/m²", or S/M/L/XL/XXL for GTT
  bcm: number
  lines: string         // screen ruling, e.g. "120 L/cm"
  transfer: string      // "<float> g/m²"
  actualVolume?: string // GTT only: the cm³/m² behind the symbolic size
}

export type AniloxRow = {
  bcm: number
  recommendedPower: number
}

// -----------------------------
// Calculation input from UI
// -----------------------------

export type CalculationInput = {
  substrate: Substrate
  inkType: InkType
  rollerType: RollerType
  volume: string
  bcm: number // derived from volume, never typed in
}

// Raw form state before validation
export type CalculationForm = {
  substrate?: string
  inkType?: string
  rollerType?: string
  volume?: string
}

export type ValidationResult<T> =
    | { valid: true; value: T }
    | { valid: false; error: string }

// -----------------------------
// Calculation result
// -----------------------------

export type CalculationResult = {
  basePower: number
  substrateContribution: number // percentage points
  inkContribution: number
  bcmContribution: number       // informational only
  transferFactor: number
  transferValue: string
  finalPower: number            // 20..100, one decimal
}

// -----------------------------
// Persisted snapshot (keys are the on-disk format)
// -----------------------------

export type SavedSetting = {
  substraat: string
  inktsoort: string
  rasterwals_type: string
  volume: string
  bcm: number
  vermogen: number
  transfer: string
}
