import Joi from 'joi';
import {
  ATTRIBUTES,
  Attribute,
  Card,
  CardImages,
  MONSTER_RACES,
  ModSpecific,
  MonsterCard,
  MonsterRace,
  NonMonsterCard,
  RARITY_TIERS,
  StatValue,
  VARIABLE_STAT,
  classifyCardType,
  isNormalMonsterType,
} from '../../models/Card';
import { ValidationDetail, patterns, toValidationDetails } from '../../utils/validation';

interface CardBaseDocument {
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

interface MonsterCardDocument extends CardBaseDocument {
  attack: StatValue;
  defense: StatValue;
  level: number;
  race: MonsterRace;
  attribute: Attribute;
}

export type CardNotice =
  | { code: 'UnknownCardType'; type: string }
  | { code: 'TagFormat'; tag: string; problem: 'format' | 'duplicate' };

export interface CardValidationError {
  reason: string;
  details: ValidationDetail[];
}

export type CardValidationResult =
  | { ok: true; card: Card; notices: CardNotice[] }
  | { ok: false; error: CardValidationError };

const imageUrl = Joi.string().uri({ scheme: ['http', 'https'] });

const baseKeys = {
  id: Joi.number().integer().positive().required(),
  name: Joi.string().required(),
  type: Joi.string().required(),
  humanReadableCardType: Joi.string().allow(''),
  frameType: Joi.string().allow(''),
  description: Joi.string().allow('').required(),
  archetype: Joi.string(),
  images: Joi.object<CardImages>({
    artwork_url: imageUrl.required(),
    small_url: imageUrl.required(),
    cropped_url: imageUrl.required(),
  }).required(),
  mod_specific: Joi.object<ModSpecific>({
    rarity_tier: Joi.string()
      .valid(...RARITY_TIERS)
      .required(),
    pack_weight: Joi.number().min(0).max(1).required(),
    craftable: Joi.boolean().required(),
    unlock_condition: Joi.string().allow('').required(),
    tags: Joi.array().items(Joi.string()).required(),
  }).required(),
};

const stat = Joi.alternatives().try(Joi.number().integer().min(0), Joi.string().valid(VARIABLE_STAT));

const cardBaseSchema = Joi.object<CardBaseDocument>(baseKeys);

const monsterCardSchema = Joi.object<MonsterCardDocument>({
  ...baseKeys,
  attack: stat.required(),
  defense: stat.required(),
  level: Joi.number().integer().min(1).max(12).required(),
  race: Joi.string()
    .valid(...MONSTER_RACES)
    .required(),
  attribute: Joi.string()
    .valid(...ATTRIBUTES)
    .required(),
});

// No coercion: "5" is not a level and "true" is not a boolean
const validationOptions: Joi.ValidationOptions = {
  abortEarly: false,
  convert: false,
  allowUnknown: true,
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const failure = (details: ValidationDetail[]): CardValidationResult => ({
  ok: false,
  error: {
    reason: details.map((detail) => detail.message).join('; '),
    details,
  },
});

const baseFields = (value: CardBaseDocument) => ({
  id: value.id,
  name: value.name,
  type: value.type,
  ...(value.humanReadableCardType !== undefined ? { humanReadableCardType: value.humanReadableCardType } : {}),
  ...(value.frameType !== undefined ? { frameType: value.frameType } : {}),
  description: value.description,
  ...(value.archetype !== undefined ? { archetype: value.archetype } : {}),
  images: {
    artwork_url: value.images.artwork_url,
    small_url: value.images.small_url,
    cropped_url: value.images.cropped_url,
  },
  mod_specific: {
    rarity_tier: value.mod_specific.rarity_tier,
    pack_weight: value.mod_specific.pack_weight,
    craftable: value.mod_specific.craftable,
    unlock_condition: value.mod_specific.unlock_condition,
    tags: [...value.mod_specific.tags],
  },
});

const tagNotices = (tags: readonly string[]): CardNotice[] => {
  const notices: CardNotice[] = [];
  const seen = new Set<string>();
  for (const tag of tags) {
    if (seen.has(tag)) {
      notices.push({ code: 'TagFormat', tag, problem: 'duplicate' });
      continue;
    }
    seen.add(tag);
    if (!patterns.tag.test(tag)) {
      notices.push({ code: 'TagFormat', tag, problem: 'format' });
    }
  }
  return notices;
};

const validateMonster = (raw: unknown): CardValidationResult => {
  const { error, value } = monsterCardSchema.validate(raw, validationOptions);
  if (error) {
    return failure(toValidationDetails(error));
  }

  if (isNormalMonsterType(value.type)) {
    const sentinelFields = (['attack', 'defense'] as const).filter((field) => value[field] === VARIABLE_STAT);
    if (sentinelFields.length > 0) {
      return failure(
        sentinelFields.map((field) => ({
          field,
          message: `"${field}" cannot be "${VARIABLE_STAT}" on a Normal monster`,
          type: 'any.invalid',
        }))
      );
    }
  }

  const card: MonsterCard = {
    kind: 'monster',
    ...baseFields(value),
    attack: value.attack,
    defense: value.defense,
    level: value.level,
    race: value.race,
    attribute: value.attribute,
  };
  return { ok: true, card, notices: tagNotices(card.mod_specific.tags) };
};

const validateNonMonster = (raw: unknown, kind: NonMonsterCard['kind'] | null): CardValidationResult => {
  const { error, value } = cardBaseSchema.validate(raw, validationOptions);
  if (error) {
    return failure(toValidationDetails(error));
  }

  const card: NonMonsterCard = { kind: kind ?? 'unknown', ...baseFields(value) };
  const notices = tagNotices(card.mod_specific.tags);
  if (kind === null) {
    notices.unshift({ code: 'UnknownCardType', type: value.type });
  }
  return { ok: true, card, notices };
};

/**
 * Check one raw card record against the card schema and build the typed card.
 *
 * The variant is picked from `type`: monster types must carry attack, defense,
 * level, race and attribute; spells and traps carry none of them (any such
 * fields in the document are left out of the result). A type matching no known
 * pattern yields a non-monster card and an `UnknownCardType` notice.
 *
 * Pure: the same input always gives the same result, and validating a returned
 * card gives back an equal card.
 */
export const validateCard = (raw: unknown): CardValidationResult => {
  const declaredType = isRecord(raw) && typeof raw.type === 'string' ? raw.type : null;
  const kind = declaredType === null ? null : classifyCardType(declaredType);

  if (kind === 'monster') {
    return validateMonster(raw);
  }
  return validateNonMonster(raw, kind);
};
