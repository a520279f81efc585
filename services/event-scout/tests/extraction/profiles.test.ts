import { describe, it, expect } from 'vitest';
import { mergeProfiles, sanitizeProfiles } from '../../src/lib/extraction/profiles.js';

describe('sanitizeProfiles', () => {
  it('drops unusable items without rejecting the list', () => {
    const profiles = sanitizeProfiles([
      { name: '  Ada Park  ', title: 'Founder', company: '', bio: null },
      { name: '' },
      'Grace Hopper',
      null,
      { title: 'Missing name' },
      { name: 'Lin Wu', image: 'javascript:alert(1)', website: 'https://linwu.example.com' }
    ]);

    expect(profiles).toEqual([
      { name: 'Ada Park', title: 'Founder' },
      { name: 'Lin Wu', website: 'https://linwu.example.com' }
    ]);
  });

  it('keeps the first of several entries for the same name', () => {
    const profiles = sanitizeProfiles([
      { name: 'Ada Park', title: 'Founder' },
      { name: 'ADA PARK', title: 'CEO' }
    ]);

    expect(profiles).toEqual([{ name: 'Ada Park', title: 'Founder' }]);
  });
});

describe('mergeProfiles', () => {
  it('lets primary values win and fills only the gaps', () => {
    const merged = mergeProfiles(
      [{ name: 'Ada Park', title: 'Founder' }],
      [{ name: 'ada park', title: 'CEO', company: 'Parkworks' }, { name: 'Lin Wu' }]
    );

    expect(merged).toEqual([
      { name: 'Ada Park', title: 'Founder', company: 'Parkworks' },
      { name: 'Lin Wu' }
    ]);
  });

  it('does not mutate its inputs', () => {
    const primary = [{ name: 'Ada Park' }];
    mergeProfiles(primary, [{ name: 'Ada Park', bio: 'Operator turned investor.' }]);

    expect(primary).toEqual([{ name: 'Ada Park' }]);
  });
});
