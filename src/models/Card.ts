export const RARITY_TIERS = ['common', 'rare', 'epic', 'legendary'] as const;
export type RarityTier = (typeof RARITY_TIERS)[number];

export const ATTRIBUTES = ['LIGHT', 'DARK', 'EARTH', 'WATER', 'FIRE', 'WIND', 'DIVINE'] as const;
export type Attribute = (typeof ATTRIBUTES)[number];

export const MONSTER_RACES = [
  'Aqua',
  'Beast',
  'Beast-Warrior',
  'Creator-God',
  'Cyberse',
  'Dinosaur',
  'Divine-Beast',
  'Dragon',
  'Fairy',
  'Fiend',
  'Fish',
  'Illusion',
  'Insect',
  'Machine',
  'Plant',
  'Psychic',
  'Pyro',
  'Reptile',
  'Rock',
  'Sea Serpent',
  'Spellcaster',
  'Thunder',
  'Warrior',
  'Winged Beast',
  'Wyrm',
  'Zombie',
] as const;
export type MonsterRace = (typeof MONSTER_RACES)[number];

/** ATK/DEF value; "?" marks a stat that is variable or set by an effect. */
export const VARIABLE_STAT = '?';
export type StatValue = number | typeof VARIABLE_STAT;

export type CardKind = 'monster' | 'spell' | 'trap' | 'unknown';

export interface CardImages {
  artwork_url: string;
  small_url: string;
  cropped_url: string;
}

export interface ModSpecific {
  rarity_tier: RarityTier;
  /** Relative selection weight in [0, 1] */
  pack_weight: number;
  craftable: boolean;
  unlock_condition: string;
  tags: string[];
}

interface CardBase {
  id: number;
  name: string;
  type: string;
  humanReadableCardType?: string;
  frameType?: string;
  description: string;
  archetype?: string;
  images: CardImages;
  mod_specific: ModSpecific;
}

export interface MonsterCard extends CardBase {
  kind: 'monster';
  attack: StatValue;
  defense: StatValue;
  /** Level, or rank for Xyz monsters */
  level: number;
  race: MonsterRace;
  attribute: Attribute;
}

export interface NonMonsterCard extends CardBase {
  kind: Exclude<CardKind, 'monster'>;
}

export type Card = MonsterCard | NonMonsterCard;

/**
 * Derive the variant from a card's `type` string. Returns null when the type
 * matches none of the known patterns.
 */
export const classifyCardType = (type: string): CardKind | null => {
  if (/monster/i.test(type) || /^token$/i.test(type.trim())) {
    return 'monster';
  }
  if (/spell/i.test(type)) {
    return 'spell';
  }
  if (/trap/i.test(type)) {
    return 'trap';
  }
  return null;
};

/** Normal monsters have printed stats only. */
export const isNormalMonsterType = (type: string): boolean => /\bnormal\b/i.test(type);
