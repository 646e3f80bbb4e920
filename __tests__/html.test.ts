import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { charLength, countOccurrences, escapeHtmlAttribute, escapeHtmlText, stripCodeFences, stripTags } from '../src/utils/html.js';

describe('stripTags', () => {
  it('replaces every tag with a space', () => {
    assert.equal(stripTags('<p>Hola <b>mundo</b></p>'), ' Hola  mundo  ');
  });
});

describe('escapeHtmlAttribute', () => {
  it('escapes ampersands, quotes and angle brackets', () => {
    assert.equal(escapeHtmlAttribute('/a?x=1&y="2"<>'), '/a?x=1&amp;y=&quot;2&quot;&lt;&gt;');
  });

  it('leaves text escaping free of quotes', () => {
    assert.equal(escapeHtmlText('Tom & "Jerry" <3'), 'Tom &amp; "Jerry" &lt;3');
  });
});

describe('charLength', () => {
  it('counts code points', () => {
    assert.equal(charLength('casa 🏠'), 6);
    assert.equal(charLength('guía'), 4);
  });
});

describe('countOccurrences', () => {
  it('counts non-overlapping matches', () => {
    assert.equal(countOccurrences('aaaa', 'aa'), 2);
    assert.equal(countOccurrences('comprar casa y comprar casa', 'comprar casa'), 2);
  });

  it('returns 0 for an empty needle', () => {
    assert.equal(countOccurrences('abc', ''), 0);
  });
});

describe('stripCodeFences', () => {
  it('removes an html fence', () => {
    assert.equal(stripCodeFences('```html\n<p>x</p>\n```'), '<p>x</p>');
  });

  it('removes a bare fence', () => {
    assert.equal(stripCodeFences('  ```\n<p>x</p>```  '), '<p>x</p>');
  });

  it('leaves unfenced text alone apart from trimming', () => {
    assert.equal(stripCodeFences('\n<p>x</p>\n'), '<p>x</p>');
  });
});
