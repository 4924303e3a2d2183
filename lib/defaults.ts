// lib/defaults.ts
import type { AniloxRow, InkType, RollerType, Substrate, TransferRange, VolumeSpec } from './types'

// Display order of the form selects
export const SUBSTRATES: readonly Substrate[] = ['Gecoat papier', 'Ongecoat papier', 'Folie', 'Karton']

export const INK_TYPES: readonly InkType[] = ['UV-inkt', 'Watergedragen inkt', 'LED-UV inkt']

export const ROLLER_TYPES: readonly RollerType[] = [
  'Hexagonal (20-30% transfer)',
  'Hachure / Trihelical (35-40% transfer)',
  'ART / TIF (40-50% transfer)',
  'GTT UniCoat (25-30% transfer)',
]

export const BASE_POWER = 40
export const MIN_POWER = 20
export const MAX_POWER = 100

// Reference ink lay-down the transfer factor is normalised against
export const MEDIUM_TRANSFER_G_PER_M2 = 3.0

export const DEFAULT_TRANSFER_RANGE: TransferRange = [0.25, 0.30]

export const SUBSTRATE_FACTORS: Readonly<Record<Substrate, number>> = {
  'Gecoat papier': 1.0,
  'Ongecoat papier': 1.2,
  'Folie': 1.3,
  'Karton': 1.1,
}

export const INK_FACTORS: Readonly<Record<InkType, number>> = {
  'UV-inkt': 1.0,
  'Watergedragen inkt': 1.2,
  'LED-UV inkt': 0.9,
}

export const TRANSFER_RANGES: Readonly<Record<RollerType, TransferRange>> = {
  'Hexagonal (20-30% transfer)': [0.20, 0.30],
  'Hachure / Trihelical (35-40% transfer)': [0.35, 0.40],
  'ART / TIF (40-50% transfer)': [0.40, 0.50],
  'GTT UniCoat (25-30% transfer)': [0.25, 0.30],
}

// Smallest to largest cell volume; order is the display order
export const VOLUME_SPECS: Readonly<Record<RollerType, readonly VolumeSpec[]>> = {
  'Hexagonal (20-30% transfer)': [
    { volume: '7 cm³/m²',  bcm: 4.5,  lines: '160 L/cm', transfer: '1.8 g/m²' },
    { volume: '10 cm³/m²', bcm: 6.4,  lines: '120 L/cm', transfer: '2.5 g/m²' },
    { volume: '13 cm³/m²', bcm: 8.4,  lines: '100 L/cm', transfer: '3.25 g/m²' },
    { volume: '16 cm³/m²', bcm: 10.3, lines: '80 L/cm',  transfer: '4.0 g/m²' },
    { volume: '20 cm³/m²', bcm: 12.9, lines: '60 L/cm',  transfer: '5.0 g/m²' },
  ],
  'Hachure / Trihelical (35-40% transfer)': [
    { volume: '7 cm³/m²',  bcm: 4.5,  lines: '160 L/cm', transfer: '2.3 g/m²' },
    { volume: '10 cm³/m²', bcm: 6.4,  lines: '120 L/cm', transfer: '3.3 g/m²' },
    { volume: '13 cm³/m²', bcm: 8.4,  lines: '100 L/cm', transfer: '4.3 g/m²' },
    { volume: '16 cm³/m²', bcm: 10.3, lines: '80 L/cm',  transfer: '5.3 g/m²' },
    { volume: '20 cm³/m²', bcm: 12.9, lines: '60 L/cm',  transfer: '6.5 g/m²' },
  ],
  'ART / TIF (40-50% transfer)': [
    { volume: '7 cm³/m²',  bcm: 4.5,  lines: '160 L/cm', transfer: '2.7 g/m²' },
    { volume: '10 cm³/m²', bcm: 6.4,  lines: '120 L/cm', transfer: '3.7 g/m²' },
    { volume: '13 cm³/m²', bcm: 8.4,  lines: '100 L/cm', transfer: '5.0 g/m²' },
    { volume: '16 cm³/m²', bcm: 10.3, lines: '80 L/cm',  transfer: '6.0 g/m²' },
    { volume: '20 cm³/m²', bcm: 12.9, lines: '60 L/cm',  transfer: '7.5 g/m²' },
  ],
  'GTT UniCoat (25-30% transfer)': [
    { volume: 'S',   bcm: 4.5,  lines: 'GTT', transfer: '1.8 g/m²',  actualVolume: '7 cm³/m²' },
    { volume: 'M',   bcm: 6.4,  lines: 'GTT', transfer: '2.5 g/m²',  actualVolume: '10 cm³/m²' },
    { volume: 'L',   bcm: 8.4,  lines: 'GTT', transfer: '3.25 g/m²', actualVolume: '13 cm³/m²' },
    { volume: 'XL',  bcm: 10.3, lines: 'GTT', transfer: '4.0 g/m²',  actualVolume: '16 cm³/m²' },
    { volume: 'XXL', bcm: 12.9, lines: 'GTT', transfer: '5.0 g/m²',  actualVolume: '20 cm³/m²' },
  ],
}

export const DEFAULT_TRANSFER_VALUE = '0.0 g/m²'

// Stand-in for the anilox spec document until its tables are extracted
export const ANILOX_FALLBACK: readonly AniloxRow[] = [
  { bcm: 1.5, recommendedPower: 40 },
  { bcm: 2.0, recommendedPower: 50 },
  { bcm: 2.5, recommendedPower: 60 },
  { bcm: 3.0, recommendedPower: 70 },
]
