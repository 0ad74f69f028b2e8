import { describe, expect, it } from 'vitest';
import { parseTemplate } from '../template/parser.js';
import {
  findMatches,
  formatPathExpression,
  formatTagPath,
  parsePathExpression,
  type PathExpression,
} from './path-expression.js';

const CONDITIONS = parseTemplate(`<Strategy>
  <Conditions>
    <Condition id="a">
      <Left-Side><Column-Value column="NetProfit" sampleType="10"/></Left-Side>
    </Condition>
    <Condition id="b">
      <Left-Side><Column-Value column="NetProfit" sampleType="20"/></Left-Side>
    </Condition>
  </Conditions>
  <Blocks>
    <Block key="First"/>
    <Block key="Second"/>
  </Blocks>
</Strategy>`).root;

describe('parsePathExpression', () => {
  it('parses plain steps', () => {
    expect(parsePathExpression('Strategy/BuildMode/Islands')).toEqual([
      { name: 'Strategy', predicates: [] },
      { name: 'BuildMode', predicates: [] },
      { name: 'Islands', predicates: [] },
    ]);
  });

  it('parses attribute predicates with either quote style', () => {
    const [, param] = parsePathExpression(`Params/Param[@key='Max'][@class="Generic"]`);

    expect(param.predicates).toEqual([
      { path: [], attribute: 'key', value: 'Max' },
      { path: [], attribute: 'class', value: 'Generic' },
    ]);
  });

  it('parses predicates that look through child elements', () => {
    const [step] = parsePathExpression(`Condition[Left-Side/Column-Value/@column='NetProfit']`);

    expect(step.predicates).toEqual([{ path: ['Left-Side', 'Column-Value'], attribute: 'column', value: 'NetProfit' }]);
  });

  it('allows "/" and "]" inside quoted values', () => {
    const [step] = parsePathExpression(`Param[@key='a/b]c']`);

    expect(step.predicates[0].value).toBe('a/b]c');
  });

  it.each([
    ['', 'path is empty'],
    ['Strategy/', 'trailing "/"'],
    ['Strategy//Data', 'empty step'],
    ['Param[@key=unquoted]', 'must look like'],
    ["Param[@key='x'", 'unterminated predicate'],
    ['9Bad', 'is not an element name'],
  ])('rejects %j', (source, reason) => {
    expect(() => parsePathExpression(source)).toThrow(reason);
  });

  it('formats back to an equivalent expression', () => {
    const source = `Strategy/Conditions/Condition[Left-Side/Column-Value/@column='NetProfit'][@use='true']`;

    expect(formatPathExpression(parsePathExpression(source))).toBe(source);
    expect(formatTagPath(parsePathExpression(source))).toBe('Strategy/Conditions/Condition');
  });
});

describe('findMatches', () => {
  it('selects one element through nested predicates', () => {
    const matches = findMatches(
      CONDITIONS,
      parsePathExpression(
        `Strategy/Conditions/Condition[Left-Side/Column-Value/@column='NetProfit'][Left-Side/Column-Value/@sampleType='20']`,
      ),
    );

    expect(matches).toHaveLength(1);
    expect(matches[0].element.attributes.get('id')).toBe('b');
  });

  it('returns every element a loose path selects', () => {
    const matches = findMatches(CONDITIONS, parsePathExpression('Strategy/Conditions/Condition'));

    expect(matches.map((match) => match.element.attributes.get('id'))).toEqual(['a', 'b']);
  });

  it('returns nothing when the first step does not name the root', () => {
    expect(findMatches(CONDITIONS, parsePathExpression('Other/Conditions'))).toEqual([]);
  });

  it('reports captured values in document order', () => {
    const path: PathExpression = [
      { name: 'Strategy', predicates: [] },
      { name: 'Blocks', predicates: [] },
      { name: 'Block', predicates: [{ path: [], attribute: 'key', value: '', capture: true }] },
    ];

    expect(findMatches(CONDITIONS, path).map((match) => match.captures)).toEqual([['First'], ['Second']]);
  });
});
