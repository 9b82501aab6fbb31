import { describe, expect, it } from 'vitest';

import {
  buildSuffixSelector,
  isXPathSelector,
  parseAbsoluteXPath,
  splitSteps,
} from '../../src/browser/xpath.js';

describe('isXPathSelector', () => {
  it('recognises the xpath= engine prefix and bare // expressions', () => {
    expect(isXPathSelector('xpath=/html/body')).toBe(true);
    expect(isXPathSelector('//div/a')).toBe(true);
    expect(isXPathSelector('#search')).toBe(false);
    expect(isXPathSelector('text=Search')).toBe(false);
  });
});

describe('splitSteps', () => {
  it('drops empty steps between slashes', () => {
    expect(splitSteps('//html/body//div[2]/a')).toEqual(['html', 'body', 'div[2]', 'a']);
  });

  it('keeps slashes inside predicates and string literals', () => {
    expect(splitSteps('/html/body/a[@href="/listing/1"]/span')).toEqual([
      'html',
      'body',
      'a[@href="/listing/1"]',
      'span',
    ]);
    expect(splitSteps("/div[contains(@class, 'a/b')]/p")).toEqual([
      "div[contains(@class, 'a/b')]",
      'p',
    ]);
  });
});

describe('parseAbsoluteXPath', () => {
  it('parses prefixed and bare absolute selectors', () => {
    expect(parseAbsoluteXPath('xpath=/html/body/div[5]')).toEqual({
      prefixed: true,
      expression: '/html/body/div[5]',
      segments: ['html', 'body', 'div[5]'],
    });
    expect(parseAbsoluteXPath('//a/b/c/d')).toEqual({
      prefixed: false,
      expression: '//a/b/c/d',
      segments: ['a', 'b', 'c', 'd'],
    });
  });

  it('rejects selectors that are not rooted XPath', () => {
    expect(parseAbsoluteXPath('#price')).toBeNull();
    expect(parseAbsoluteXPath('xpath=.//span')).toBeNull();
    expect(parseAbsoluteXPath('xpath=/')).toBeNull();
  });
});

describe('buildSuffixSelector', () => {
  it('drops leading steps and keeps the selector form', () => {
    const bare = parseAbsoluteXPath('//a/b/c/d');
    const prefixed = parseAbsoluteXPath('xpath=/html/body/form/input[2]');
    if (!bare || !prefixed) throw new Error('expected selectors to parse');

    expect(buildSuffixSelector(bare, 1)).toBe('//b/c/d');
    expect(buildSuffixSelector(bare, 3)).toBe('//d');
    expect(buildSuffixSelector(prefixed, 2)).toBe('xpath=//form/input[2]');
  });
});
