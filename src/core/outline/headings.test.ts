import { describe, it, expect } from 'vitest';
import { classifyHeading, detectHeadings, toTitleCase } from './headings.js';

describe('classifyHeading', () => {
  it('reads numbered headings with dot-depth levels', () => {
    expect(classifyHeading('2.3 Climate Risk')).toEqual({ level: 2, title: 'Climate Risk' });
    expect(classifyHeading('4 Social Impact')).toEqual({ level: 1, title: 'Social Impact' });
    expect(classifyHeading('  2.3   Climate   Risk ')).toEqual({ level: 2, title: 'Climate Risk' });
  });

  it('title-cases short all-caps lines', () => {
    expect(classifyHeading('OUR APPROACH TO NATURE')).toEqual({ level: 1, title: 'Our Approach To Nature' });
    expect(classifyHeading('ESG-LINKED PAY')).toEqual({ level: 1, title: 'Esg-Linked Pay' });
  });

  it('accepts proper-case multi-word lines', () => {
    expect(classifyHeading('Materiality assessment')).toEqual({ level: 1, title: 'Materiality assessment' });
  });

  it.each([
    ['SCOPE'],
    ['Governance'],
    ['Our emissions fell sharply this year.'],
    ['Revenue, costs, margins, and outlook'],
    ['Figure 3 Emissions by scope'],
    ['Table 12 Water withdrawal'],
    ['3 tonnes of waste were diverted'],
    ['the board met six times'],
    [`Long ${'word '.repeat(30)}line`],
  ])('rejects %j', (line) => {
    expect(classifyHeading(line)).toBeNull();
  });
});

describe('toTitleCase', () => {
  it('capitalises the first letter of every letter run', () => {
    expect(toTitleCase('NET-ZERO BY 2040')).toBe('Net-Zero By 2040');
  });
});

describe('detectHeadings', () => {
  it('finds a numbered heading on page 5', () => {
    const pages = ['', '', '', '', '2.3 Climate Risk\nthe company reduced emissions by 4% this year.'];
    expect(detectHeadings(pages)).toEqual([{ level: 2, title: 'Climate Risk', page: 5 }]);
  });

  it('dedupes per page and sorts by page, level, title', () => {
    const pages = [
      'Zeta Section Title\nAlpha Section Title\nZeta Section Title\n1.1 Beta Detail',
      'Zeta Section Title',
    ];
    expect(detectHeadings(pages)).toEqual([
      { level: 1, title: 'Alpha Section Title', page: 1 },
      { level: 1, title: 'Zeta Section Title', page: 1 },
      { level: 2, title: 'Beta Detail', page: 1 },
      { level: 1, title: 'Zeta Section Title', page: 2 },
    ]);
  });

  it('abstains on pages of body prose', () => {
    expect(detectHeadings(['we measured water use at every site.', 'results were in line with targets.'])).toEqual([]);
  });
});
