import { describe, expect, it } from 'vitest'
import { InvalidPathError } from '../errors.js'
import { parseHtml } from '../query/document.js'
import { queryList, queryText, requirePath, trim } from '../query/extract.js'

const PAGE_URL = 'https://www.example.com/player/42'

const HTML = `
<html>
  <body>
    <ul id="names"><li>Foo</li><li>   </li><li>Bar</li></ul>
    <div class="letters"><span>A</span><span>B</span><span>C</span><span>D</span></div>
    <p class="bio">  Born in
       Lisbon&nbsp; </p>
    <a class="profile" href="/player/42">Profile</a>
  </body>
</html>
`

const LETTERS = "//div[@class='letters']/span"

describe('trim', () => {
  it('collapses whitespace runs and strips the ends', () => {
    expect(trim('  a \n\t b  ')).toBe('a b')
  })
})

describe('queryList', () => {
  const doc = parseHtml(HTML, PAGE_URL)

  it('drops values that are empty after trimming', () => {
    expect(queryList(doc, "//ul[@id='names']/li")).toEqual(['Foo', 'Bar'])
  })

  it('keeps empty values when asked', () => {
    expect(queryList(doc, "//ul[@id='names']/li", { removeEmpty: false })).toEqual(['Foo', '', 'Bar'])
  })

  it('returns an empty list when nothing matches', () => {
    expect(queryList(doc, '//table//td')).toEqual([])
  })

  it('wraps a scalar result in a list', () => {
    expect(queryList(doc, `count(${LETTERS})`)).toEqual(['4'])
  })
})

describe('queryText', () => {
  const doc = parseHtml(HTML, PAGE_URL)

  it('returns the first match by default', () => {
    expect(queryText(doc, LETTERS)).toBe('A')
  })

  it('picks by position, counting negatives from the end', () => {
    expect(queryText(doc, LETTERS, { pos: 2 })).toBe('C')
    expect(queryText(doc, LETTERS, { pos: -2 })).toBe('C')
    expect(queryText(doc, LETTERS, { pos: 10 })).toBeUndefined()
  })

  it('joins every match', () => {
    expect(queryText(doc, LETTERS, { joinWith: ',' })).toBe('A,B,C,D')
  })

  it('slices with from and to before picking', () => {
    expect(queryText(doc, LETTERS, { from: 1, to: 3 })).toBe('B')
    expect(queryText(doc, LETTERS, { from: 1, to: 3, joinWith: '|' })).toBe('B|C')
    expect(queryText(doc, LETTERS, { to: 2, joinWith: ',' })).toBe('A,B')
    expect(queryText(doc, LETTERS, { from: 2, joinWith: ',' })).toBe('C,D')
  })

  it('applies at to the sliced list and lets it win over joinWith and pos', () => {
    expect(queryText(doc, LETTERS, { at: -1 })).toBe('D')
    expect(queryText(doc, LETTERS, { from: 1, at: 1 })).toBe('C')
    expect(queryText(doc, LETTERS, { at: 0, joinWith: ',' })).toBe('A')
    expect(queryText(doc, LETTERS, { at: 3, pos: 0 })).toBe('D')
    expect(queryText(doc, LETTERS, { at: 10 })).toBeUndefined()
  })

  it('returns undefined when nothing matches', () => {
    expect(queryText(doc, '//h1')).toBeUndefined()
    expect(queryText(doc, 'string(//h1)')).toBeUndefined()
  })

  it('joins a whitespace-only match to an empty string', () => {
    expect(queryText(doc, "//ul[@id='names']/li[2]", { joinWith: ',' })).toBe('')
  })

  it('normalizes whitespace including non-breaking spaces', () => {
    expect(queryText(doc, "//p[@class='bio']")).toBe('Born in Lisbon')
  })

  it('reads attribute values', () => {
    expect(queryText(doc, "//a[@class='profile']/@href")).toBe('/player/42')
  })

  it('rejects malformed paths', () => {
    expect(() => queryText(doc, '//p[')).toThrow(InvalidPathError)
  })
})

describe('requirePath', () => {
  const doc = parseHtml(HTML, PAGE_URL)

  it('returns the first value when present', () => {
    expect(requirePath(doc, "//ul[@id='names']/li")).toEqual({ ok: true, value: 'Foo' })
  })

  it('reports NotFoundInPage for a missing node', () => {
    expect(requirePath(doc, '//h1')).toEqual({
      ok: false,
      error: { kind: 'NotFoundInPage', url: PAGE_URL },
    })
  })

  it('treats a whitespace-only node as missing', () => {
    expect(requirePath(doc, "//ul[@id='names']/li[2]")).toEqual({
      ok: false,
      error: { kind: 'NotFoundInPage', url: PAGE_URL },
    })
  })
})
