// lib/help.ts
export type HelpField = 'substrate' | 'ink_type' | 'bcm' | 'rasterwals' | 'volume' | 'general'

const HELP_TEXTS: Record<HelpField, string> = {
  substrate: 'Het type materiaal waarop gedrukt wordt. Dit beïnvloedt de UV-absorptie.',
  ink_type: 'Het type inkt dat gebruikt wordt. UV-inkt heeft andere uithardingseisen.',
  bcm: 'BCM (Billion Cubic Microns) is het celvolume van de aniloxwals.',
  rasterwals:
      'Het type rasterwals bepaalt de inktoverdracht. Een hogere transfer betekent meer inkt en dus meer UV-vermogen nodig.',
  volume: 'Het specifieke volume van de rasterwals dat de hoeveelheid inkt bepaalt die kan worden overgedragen.',
  general: 'Deze calculator helpt bij het bepalen van de optimale UV-uitharding instellingen voor flexografisch drukwerk.',
}

const isHelpField = (f: string): f is HelpField => Object.prototype.hasOwnProperty.call(HELP_TEXTS, f)

export function getHelpText(field: string): string {
  return isHelpField(field) ? HELP_TEXTS[field] : ''
}
