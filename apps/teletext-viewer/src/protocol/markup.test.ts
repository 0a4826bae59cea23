import { describe, expect, it } from 'vitest';
import { ViewerError } from '../lib/errors.js';
import { decodeEntities, decodeMarkup, parseColor } from './markup.js';
import { CellFlag, DEFAULT_STYLE } from './types.js';

const DOCUMENT = [
  '<html><body><div>',
  '<big>News &amp; weather</big>',
  '<a href="?P=101_0001">&lt;&lt;</a> <a href="?P=103_0001">&gt;&gt;</a> <a href="?P=102_0002">next</a>',
  '</div><pre>\r\nLine one\r\n<a href="?P=200_0001">200</a> Sport\r\n</pre>',
  '<p>Subpages: <a href="?P=102_0001">1</a> <a href="?P=102_0002">2</a> <a href="?P=102_0003">3</a> 12:45</p>',
  '<p><a href="?P=100_0001">Index</a> <a href="?P=300_0001">Weather</a></p>',
  '</body></html>',
].join('');

function decodeFailure(raw: Uint8Array | string): ViewerError {
  try {
    decodeMarkup(raw);
  } catch (error) {
    if (error instanceof ViewerError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected decodeMarkup to fail');
}

describe('decodeMarkup', () => {
  it('reads the header fields around the page body', () => {
    const { header } = decodeMarkup(DOCUMENT, { pageNumber: 102 });
    expect(header.title).toBe('News & weather');
    expect(header.navigation).toEqual([
      { label: '<<', target: { number: 101, subpage: 1 } },
      { label: '>>', target: { number: 103, subpage: 1 } },
      { label: 'next', target: { number: 102, subpage: 2 } },
    ]);
    expect(header.subpageCount).toBe(3);
    expect(header.sections).toEqual([
      { label: 'Index', target: { number: 100, subpage: 1 } },
      { label: 'Weather', target: { number: 300, subpage: 1 } },
    ]);
  });

  it('counts subpages only from anchors back to the same page', () => {
    const { header } = decodeMarkup(DOCUMENT, { pageNumber: 500 });
    expect(header.subpageCount).toBeNull();
    expect(header.sections.map((section) => section.label)).toEqual(['1', '2', '3', 'Index', 'Weather']);
  });

  it('reads the count from an n/m counter and ignores a timestamp', () => {
    const { header } = decodeMarkup('<pre>News</pre><p>Sivu 1/3 päivitetty 12:45</p>');
    expect(header.subpageCount).toBe(3);
  });

  it('does not read a section label as a subpage count', () => {
    const { header } = decodeMarkup('<pre>News</pre><p><a href="?P=102_0001">Uutiset 102</a></p>', { pageNumber: 100 });
    expect(header.subpageCount).toBeNull();
    expect(header.sections).toEqual([{ label: 'Uutiset 102', target: { number: 102, subpage: 1 } }]);
  });

  it('emits body tokens in source order', () => {
    expect(decodeMarkup(DOCUMENT).tokens).toEqual([
      { type: 'text', text: 'Line one' },
      { type: 'line_break' },
      { type: 'link_start', target: { number: 200, subpage: 1 } },
      { type: 'text', text: '200' },
      { type: 'link_end' },
      { type: 'text', text: ' Sport' },
      { type: 'line_break' },
    ]);
  });

  it('treats a document without <pre> as all body', () => {
    const stream = decodeMarkup('plain');
    expect(stream.header).toEqual({ title: null, navigation: [], subpageCount: null, sections: [] });
    expect(stream.tokens).toEqual([{ type: 'text', text: 'plain' }]);
  });

  it('decodes UTF-8 bytes', () => {
    const bytes = new TextEncoder().encode('<pre>Sää 15°</pre>');
    expect(decodeMarkup(bytes).tokens).toEqual([{ type: 'text', text: 'Sää 15°' }]);
  });

  it('nests style directives and restores the enclosing style on close', () => {
    const tokens = decodeMarkup('<font color="yellow">A<span class="bg-blue bold">B</span>C</font>D').tokens;
    expect(tokens).toEqual([
      { type: 'style', style: { fg: 'yellow', bg: 'black', flags: CellFlag.None } },
      { type: 'text', text: 'A' },
      { type: 'style', style: { fg: 'yellow', bg: 'blue', flags: CellFlag.Bold } },
      { type: 'text', text: 'B' },
      { type: 'style', style: { fg: 'yellow', bg: 'black', flags: CellFlag.None } },
      { type: 'text', text: 'C' },
      { type: 'style', style: DEFAULT_STYLE },
      { type: 'text', text: 'D' },
    ]);
  });

  it('skips style tokens that do not change the style', () => {
    expect(decodeMarkup('<font color="white">x</font>').tokens).toEqual([{ type: 'text', text: 'x' }]);
  });

  it('maps big and blink to cell flags', () => {
    const tokens = decodeMarkup('<big><blink>!</blink></big>').tokens;
    expect(tokens.slice(0, 2)).toEqual([
      { type: 'style', style: { fg: 'white', bg: 'black', flags: CellFlag.DoubleHeight } },
      { type: 'style', style: { fg: 'white', bg: 'black', flags: CellFlag.DoubleHeight | CellFlag.Blink } },
    ]);
  });

  it('accepts every line break form', () => {
    expect(decodeMarkup('a\nb\rc<br>d').tokens).toEqual([
      { type: 'text', text: 'a' },
      { type: 'line_break' },
      { type: 'text', text: 'b' },
      { type: 'line_break' },
      { type: 'text', text: 'c' },
      { type: 'line_break' },
      { type: 'text', text: 'd' },
    ]);
  });

  it('decodes entities and keeps a bare < as text', () => {
    expect(decodeMarkup('A&nbsp;B &lt;3 x < 5').tokens).toEqual([{ type: 'text', text: 'A B <3 x < 5' }]);
  });

  it('ignores anchors that do not point at a page', () => {
    expect(decodeMarkup('<a href="https://example.invalid/">out</a>').tokens).toEqual([{ type: 'text', text: 'out' }]);
  });

  it('closes a link left open at the end of the body', () => {
    expect(decodeMarkup('<a href="?P=300_0001">300').tokens).toEqual([
      { type: 'link_start', target: { number: 300, subpage: 1 } },
      { type: 'text', text: '300' },
      { type: 'link_end' },
    ]);
  });

  it('rejects invalid UTF-8', () => {
    expect(decodeFailure(new Uint8Array([0x41, 0xff])).code).toBe('malformed_encoding');
  });

  it('rejects an unterminated tag', () => {
    const failure = decodeFailure('<pre>abc <font color="red"</pre>');
    expect(failure.code).toBe('malformed_encoding');
    expect(failure.message).toMatch(/^unterminated tag/);
  });

  it('rejects a body without its closing </pre>', () => {
    expect(decodeFailure('<pre>abc').message).toBe('missing </pre> for page body');
  });

  it('rejects an unterminated character reference', () => {
    expect(decodeFailure('<pre>Fish &amp chips</pre>').code).toBe('malformed_encoding');
  });

  it('keeps ampersands that start no reference as text', () => {
    expect(decodeMarkup('<pre>AT&T Q&A R & D &madeup;</pre>').tokens).toEqual([
      { type: 'text', text: 'AT&T Q&A R & D &madeup;' },
    ]);
  });

  it('rejects numeric references without digits or a semicolon', () => {
    expect(decodeFailure('<pre>&#</pre>').code).toBe('malformed_encoding');
    expect(decodeFailure('<pre>&#x;</pre>').code).toBe('malformed_encoding');
    expect(decodeFailure('<pre>&#65 chips</pre>').code).toBe('malformed_encoding');
    expect(decodeFailure('<pre>&#12a;</pre>').code).toBe('malformed_encoding');
  });
});

describe('decodeEntities', () => {
  it('decodes numeric and named references', () => {
    expect(decodeEntities('&#65;&#x42;&copy;&nbsp;&amp;')).toBe('AB\u00a9 &');
  });
});

describe('parseColor', () => {
  it('accepts palette names and their hex codes', () => {
    expect(parseColor('Cyan')).toBe('cyan');
    expect(parseColor('#FF0000')).toBe('red');
    expect(parseColor('orange')).toBeNull();
    expect(parseColor(undefined)).toBeNull();
  });
});
