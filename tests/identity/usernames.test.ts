import '../support/env';
import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import {
  baseUsername,
  isValidUsername,
  nextAvailableUsername,
  randomSuffix,
  slugify,
} from '../../services/identity/src/usernames';
import { ServiceUnavailableError } from '@huddle/shared';

const USER_ID = '1234abcd-5678-4ef0-9abc-def012345678';

describe('slugify', () => {
  it('lowercases, maps hyphens and strips everything else', () => {
    assert.strictEqual(slugify('  John-Doe!! ', 'fallback'), 'john_doe');
    assert.strictEqual(slugify('a__b--c', 'fallback'), 'a_b_c');
  });

  it('falls back when nothing survives', () => {
    assert.strictEqual(slugify('___', 'fallback'), 'fallback');
    assert.strictEqual(slugify(null, 'fallback'), 'fallback');
  });
});

describe('baseUsername', () => {
  it('prefers the chosen handle over the email', () => {
    assert.strictEqual(baseUsername({ preferred_username: 'Alice Smith', email: 'x@example.com' }, USER_ID), 'alicesmith');
    assert.strictEqual(baseUsername({ user_name: 'the-bob' }, USER_ID), 'the_bob');
  });

  it('uses the email local part', () => {
    assert.strictEqual(baseUsername({ email: 'bob.jones@example.com' }, USER_ID), 'bobjones');
  });

  it('derives a handle from the id when nothing else is given', () => {
    assert.strictEqual(baseUsername({}, USER_ID), 'user_1234abcd');
    assert.strictEqual(baseUsername({ preferred_username: 'a' }, USER_ID), 'user_1234ab');
  });

  it('truncates long handles without a trailing underscore', () => {
    assert.strictEqual(baseUsername({ preferred_username: 'a'.repeat(30) }, USER_ID), 'a'.repeat(24));
    assert.strictEqual(baseUsername({ preferred_username: `${'x'.repeat(23)}_y` }, USER_ID), 'x'.repeat(23));
  });
});

describe('isValidUsername', () => {
  it('accepts only normalized handles within bounds', () => {
    assert.strictEqual(isValidUsername('alice_1'), true);
    assert.strictEqual(isValidUsername('ab'), false);
    assert.strictEqual(isValidUsername('Alice'), false);
    assert.strictEqual(isValidUsername('a__b'), false);
    assert.strictEqual(isValidUsername('_abc'), false);
    assert.strictEqual(isValidUsername('a'.repeat(33)), false);
  });
});

describe('nextAvailableUsername', () => {
  it('returns the base when free', async () => {
    assert.strictEqual(await nextAvailableUsername('alice', async () => true), 'alice');
  });

  it('tries numbered variants next', async () => {
    const taken = new Set(['alice', 'alice2', 'alice3']);
    assert.strictEqual(await nextAvailableUsername('alice', async (c) => !taken.has(c)), 'alice4');
  });

  it('falls back to random suffixes', async () => {
    const taken = new Set(['alice', ...Array.from({ length: 18 }, (_, i) => `alice${i + 2}`)]);
    assert.strictEqual(await nextAvailableUsername('alice', async (c) => !taken.has(c), () => 0), 'alicebbb');
  });

  it('gives up after every attempt is taken', async () => {
    let attempts = 0;
    await assert.rejects(
      nextAvailableUsername('alice', async () => {
        attempts += 1;
        return false;
      }),
      (err: unknown) => err instanceof ServiceUnavailableError && err.code === 'username_exhausted',
    );
    assert.strictEqual(attempts, 1 + 18 + 50 + 200);
  });

  it('draws suffixes from the consonant and digit alphabet', () => {
    assert.strictEqual(randomSuffix(3, () => 0.999), '999');
    assert.strictEqual(randomSuffix(2, () => 0), 'bb');
  });
});
