#!/usr/bin/env node
/**
 * Naming Tests
 * Concept folder sanitization and image file names
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import * as path from 'path';
import { conceptDir, conceptFileStem, imageBaseName, sanitizeFolderName, withExtension } from '../cli/lib/naming';

test('sanitizeFolderName lowercases, strips and joins with underscores', () => {
  assert.equal(sanitizeFolderName('Ancient  Rome!!'), 'ancient_rome');
  assert.equal(sanitizeFolderName('  Julius Caesar  '), 'julius_caesar');
  assert.equal(sanitizeFolderName('rock-n-roll_history'), 'rock-n-roll_history');
  assert.equal(sanitizeFolderName('Café / Bar'), 'caf_bar');
});

test('sanitizeFolderName falls back to "keyword" when nothing is left', () => {
  assert.equal(sanitizeFolderName(''), 'keyword');
  assert.equal(sanitizeFolderName('!!!'), 'keyword');
  assert.equal(sanitizeFolderName('日本'), 'keyword');
});

test('sanitizeFolderName caps the length at 80', () => {
  const name = sanitizeFolderName('a'.repeat(200));
  assert.equal(name.length, 80);
  assert.match(sanitizeFolderName('The Fall of the Western Roman Empire in 476 AD'), /^[a-z0-9_-]+$/);
});

test('conceptFileStem keeps case and replaces spaces and slashes', () => {
  assert.equal(conceptFileStem('AC/DC live', 30), 'AC_DC_live');
  assert.equal(conceptFileStem('Roman Empire', 5), 'Roman');
});

test('conceptFileStem replaces characters Windows rejects in file names', () => {
  assert.equal(conceptFileStem('Rome: "Caesar"?', 20), 'Rome___Caesar__');
  assert.equal(conceptFileStem('a*b|c<d>e', 20), 'a_b_c_d_e');
});

test('imageBaseName counts from the concept offset without timestamps', () => {
  const naming = { concept: 'Roman Empire', runOffset: 7, conceptOffset: 2 };
  assert.equal(imageBaseName(naming, 0), 'Roman_Empire_03');
  assert.equal(imageBaseName(naming, 9), 'Roman_Empire_12');
});

test('imageBaseName uses the run-wide timestamp while one exists', () => {
  const naming = {
    concept: 'Roman Empire',
    timestamps: ['00-00-01-000', '00-00-04-250', '00-00-09-900'],
    runOffset: 1,
    conceptOffset: 0,
  };
  assert.equal(imageBaseName(naming, 0), '00-00-04-250_Roman_Empire');
  assert.equal(imageBaseName(naming, 1), '00-00-09-900_Roman_Empire');
  assert.equal(imageBaseName(naming, 2), 'Roman_Empire_03');
});

test('counter stems are limited to 20 characters, timestamp stems to 30', () => {
  const concept = 'The Very Long Concept Name Of Things';
  assert.equal(imageBaseName({ concept, runOffset: 0, conceptOffset: 0 }, 0), 'The_Very_Long_Concep_01');
  assert.equal(
    imageBaseName({ concept, timestamps: ['00-00-00-000'], runOffset: 0, conceptOffset: 0 }, 0),
    '00-00-00-000_The_Very_Long_Concept_Name_Of_'
  );
});

test('withExtension and conceptDir', () => {
  assert.equal(withExtension('/tmp/x/Rome_01', 'png'), '/tmp/x/Rome_01.png');
  assert.equal(conceptDir('/tmp/out', 'Ancient Rome'), path.join('/tmp/out', 'ancient_rome'));
});
