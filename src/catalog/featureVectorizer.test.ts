import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  DEFAULT_DIMENSIONS,
  FeatureVectorizer,
  fnv1a32,
  productText,
  tokenize,
} from './featureVectorizer';
import { InvalidArgumentError } from '../errors';

describe('fnv1a32', () => {
  it('matches the reference FNV-1a values', () => {
    assert.equal(fnv1a32(''), 2166136261);
    assert.equal(fnv1a32('a'), 3826002220);
  });
});

describe('tokenize', () => {
  it('lowercases and splits on non-alphanumeric runs', () => {
    assert.deepEqual(tokenize('Red, SHOES!  running-shoes'), ['red', 'shoes', 'running', 'shoes']);
  });

  it('returns no tokens for punctuation only', () => {
    assert.deepEqual(tokenize(' --- !!! '), []);
  });
});

describe('productText', () => {
  it('joins name, description and tags', () => {
    const text = productText({
      name: 'Running Shoes',
      description: 'Lightweight',
      tags: ['fitness', 'running'],
    });
    assert.equal(text, 'Running Shoes Lightweight fitness running');
  });
});

describe('FeatureVectorizer', () => {
  const vectorizer = new FeatureVectorizer();

  it('is deterministic', () => {
    const text = 'Premium wireless headphones with noise cancellation';
    assert.deepEqual(vectorizer.vectorize(text), vectorizer.vectorize(text));
    assert.deepEqual(vectorizer.vectorize(text), new FeatureVectorizer().vectorize(text));
  });

  it('produces fixed-length vectors', () => {
    assert.equal(vectorizer.dimensions, DEFAULT_DIMENSIONS);
    assert.equal(vectorizer.vectorize('red shoes').length, 128);
    assert.equal(new FeatureVectorizer({ dimensions: 16 }).vectorize('red shoes').length, 16);
  });

  it('counts tokens into hashed buckets', () => {
    const vector = vectorizer.vectorize('red red shoes');
    assert.equal(vector[75], 2);
    assert.equal(vector[52], 1);
    assert.equal(vector.reduce((a, b) => a + b, 0), 3);
  });

  it('maps empty text to the zero vector', () => {
    assert.deepEqual(vectorizer.vectorize(''), new Array(128).fill(0));
    assert.deepEqual(vectorizer.vectorize('!!!'), new Array(128).fill(0));
  });

  it('gives distinct texts distinct vectors', () => {
    assert.notDeepEqual(vectorizer.vectorize('red shoes'), vectorizer.vectorize('blue hat'));
  });

  it('depends on the salt', () => {
    const salted = new FeatureVectorizer({ salt: 'other' }).vectorize('red');
    assert.equal(salted[68], 1);
    assert.equal(salted[75], 0);
  });

  it('keeps every component finite', () => {
    const vector = vectorizer.vectorize('Ünïcode tëxt 42 ☃ snow');
    assert.ok(vector.every(Number.isFinite));
  });

  it('rejects a non-positive dimension count', () => {
    assert.throws(() => new FeatureVectorizer({ dimensions: 0 }), InvalidArgumentError);
    assert.throws(() => new FeatureVectorizer({ dimensions: 2.5 }), InvalidArgumentError);
  });
});
