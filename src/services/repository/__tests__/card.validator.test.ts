import { describe, it, expect } from '@jest/globals';
import { validateCard } from '../card.validator';
import { monsterCard, spellCard, withModSpecific } from './fixtures';

describe('validateCard', () => {
  describe('monsters', () => {
    it('accepts a complete monster and tags it as such', () => {
      const result = validateCard(monsterCard(46986414));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.card).toEqual({ kind: 'monster', ...monsterCard(46986414) });
      expect(result.notices).toEqual([]);
    });

    it('rejects a monster without a level', () => {
      const { level, ...card } = monsterCard(1);
      expect(level).toBe(4);

      const result = validateCard(card);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.details).toEqual([{ field: 'level', message: '"level" is required', type: 'any.required' }]);
      expect(result.error.reason).toBe('"level" is required');
    });

    it.each([0, 13, 4.5])('rejects level %p', (level) => {
      expect(validateCard(monsterCard(1, { level })).ok).toBe(false);
    });

    it('does not coerce numeric strings', () => {
      const result = validateCard(monsterCard(1, { level: '4' }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.details.map((detail) => [detail.field, detail.type])).toEqual([['level', 'number.base']]);
    });

    it('allows "?" stats on effect monsters', () => {
      const result = validateCard(monsterCard(2, { attack: '?', defense: '?' }));

      expect(result.ok).toBe(true);
      if (!result.ok || result.card.kind !== 'monster') return;
      expect(result.card.attack).toBe('?');
      expect(result.card.defense).toBe('?');
    });

    it('refuses "?" stats on Normal monsters', () => {
      const result = validateCard(monsterCard(3, { type: 'Normal Monster', attack: '?' }));

      expect(result).toEqual({
        ok: false,
        error: {
          reason: '"attack" cannot be "?" on a Normal monster',
          details: [{ field: 'attack', message: '"attack" cannot be "?" on a Normal monster', type: 'any.invalid' }],
        },
      });
    });

    it('rejects races and attributes outside the closed sets', () => {
      const result = validateCard(monsterCard(4, { race: 'Robot', attribute: 'SHADOW' }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.details.map((detail) => detail.field)).toEqual(['race', 'attribute']);
    });

    it('treats tokens as monsters', () => {
      const result = validateCard(monsterCard(5, { type: 'Token', attack: 0, defense: 0, level: 1 }));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.card.kind).toBe('monster');
    });
  });

  describe('spells and traps', () => {
    it('accepts a spell without monster fields', () => {
      const result = validateCard(spellCard(10));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.card.kind).toBe('spell');
    });

    it('leaves monster fields out of a spell', () => {
      const result = validateCard(spellCard(11, { attack: 500, level: 3 }));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect('attack' in result.card).toBe(false);
      expect('level' in result.card).toBe(false);
    });

    it('classifies traps from the type string', () => {
      const result = validateCard(spellCard(12, { type: 'Trap Card' }));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.card.kind).toBe('trap');
    });

    it('keeps a card of unknown type as non-monster with a notice', () => {
      const result = validateCard(spellCard(13, { type: 'Skill Card' }));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.card.kind).toBe('unknown');
      expect(result.notices).toEqual([{ code: 'UnknownCardType', type: 'Skill Card' }]);
    });
  });

  describe('mod_specific', () => {
    it.each([0, 1])('accepts pack_weight %p', (weight) => {
      expect(validateCard(withModSpecific(spellCard(20), { pack_weight: weight })).ok).toBe(true);
    });

    it('rejects pack_weight 1.5', () => {
      const result = validateCard(withModSpecific(spellCard(21), { pack_weight: 1.5 }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.details.map((detail) => [detail.field, detail.type])).toEqual([
        ['mod_specific.pack_weight', 'number.max'],
      ]);
    });

    it('rejects an unknown rarity tier', () => {
      const result = validateCard(withModSpecific(spellCard(22), { rarity_tier: 'mythic' }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.details[0].field).toBe('mod_specific.rarity_tier');
    });

    it('reports badly formatted and repeated tags', () => {
      const result = validateCard(withModSpecific(spellCard(23), { tags: ['Fire Type', 'draw', 'draw'] }));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.notices).toEqual([
        { code: 'TagFormat', tag: 'Fire Type', problem: 'format' },
        { code: 'TagFormat', tag: 'draw', problem: 'duplicate' },
      ]);
    });
  });

  it('rejects image URLs that are not http(s)', () => {
    const card = spellCard(30);
    const result = validateCard({
      ...card,
      images: { artwork_url: 'https://images.test/a.jpg', small_url: 'ftp://images.test/s.jpg', cropped_url: 'https://images.test/c.jpg' },
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.details[0].field).toBe('images.small_url');
  });

  it('rejects values that are not objects', () => {
    expect(validateCard(null).ok).toBe(false);
    expect(validateCard('card').ok).toBe(false);
  });

  it('drops unknown keys from the result', () => {
    const result = validateCard(spellCard(31, { legacy_id: 'x-31' }));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect('legacy_id' in result.card).toBe(false);
  });

  it.each([
    ['effect monster', monsterCard(40, { archetype: 'Blue-Eyes', attack: '?' })],
    ['normal monster', monsterCard(41, { type: 'Normal Monster' })],
    ['spell', spellCard(42, { defense: 100 })],
    ['unknown type', spellCard(43, { type: 'Skill Card' })],
  ])('is idempotent for a %s', (_label, raw) => {
    const first = validateCard(raw);
    expect(first.ok).toBe(true);
    if (!first.ok) return;

    const second = validateCard(first.card);
    expect(second.ok).toBe(true);
    if (!second.ok) return;
    expect(second.card).toEqual(first.card);
  });
});
