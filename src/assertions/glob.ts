/**
 * Extended glob patterns, matched against a whole string.
 *
 * Grammar:
 *
 *   pattern := item*
 *   item    := '*' | '?' | class | group | '\' any | char
 *   group   := op '(' alt ('|' alt)* ')'     op is one of + * ? @ !
 *   alt     := item*
 *   class   := '[' ('!' | '^')? ']'? member* ']'
 *   member  := char '-' char | '[:' name ':]' | '\' any | char
 *
 * `*` and `?` also match `/` and newlines. An unterminated class or group is
 * literal text. Within a group `|` separates alternatives; groups nest.
 */

export type GroupOp = '+' | '*' | '?' | '@' | '!';

export type ClassMember =
  | { kind: 'char'; char: string }
  | { kind: 'range'; from: string; to: string }
  | { kind: 'posix'; name: PosixClass };

export interface GroupNode {
  type: 'group';
  op: GroupOp;
  alternatives: GlobNode[][];
}

export type GlobNode =
  | { type: 'literal'; text: string }
  | { type: 'any' }
  | { type: 'star' }
  | { type: 'class'; negated: boolean; members: ClassMember[] }
  | GroupNode;

const POSIX_CLASSES = {
  alnum: /[A-Za-z0-9]/,
  alpha: /[A-Za-z]/,
  blank: /[ \t]/,
  cntrl: /[\x00-\x1f\x7f]/,
  digit: /[0-9]/,
  graph: /[\x21-\x7e]/,
  lower: /[a-z]/,
  print: /[\x20-\x7e]/,
  punct: /[!-/:-@[-`{-~]/,
  space: /\s/,
  upper: /[A-Z]/,
  xdigit: /[0-9A-Fa-f]/,
} as const;

export type PosixClass = keyof typeof POSIX_CLASSES;

function isPosixClass(name: string): name is PosixClass {
  return Object.hasOwn(POSIX_CLASSES, name);
}

/** The code point starting at `index`, or '' past the end */
function codePointAt(text: string, index: number): string {
  const code = text.codePointAt(index);
  return code === undefined ? '' : String.fromCodePoint(code);
}

function isGroupOp(ch: string): ch is GroupOp {
  return ch === '+' || ch === '*' || ch === '?' || ch === '@' || ch === '!';
}

class GlobParser {
  private pos = 0;

  constructor(private readonly source: string) {}

  parse(): GlobNode[] {
    return this.parseSequence(false);
  }

  private parseSequence(inGroup: boolean): GlobNode[] {
    const nodes: GlobNode[] = [];
    const src = this.source;

    while (this.pos < src.length) {
      const ch = src[this.pos];
      if (ch === ')' || ch === '|') {
        if (inGroup) break;
        // Outside any group these are plain text
        pushLiteral(nodes, ch);
        this.pos++;
        continue;
      }

      if (isGroupOp(ch) && src[this.pos + 1] === '(') {
        const group = this.parseGroup(ch);
        if (group) {
          nodes.push(group);
        } else {
          pushLiteral(nodes, ch);
          this.pos++;
        }
        continue;
      }

      switch (ch) {
        case '*':
          nodes.push({ type: 'star' });
          this.pos++;
          break;
        case '?':
          nodes.push({ type: 'any' });
          this.pos++;
          break;
        case '[': {
          const cls = this.parseClass();
          if (cls) {
            nodes.push(cls);
          } else {
            pushLiteral(nodes, ch);
            this.pos++;
          }
          break;
        }
        case '\\':
          if (this.pos + 1 < src.length) {
            pushLiteral(nodes, src[this.pos + 1]);
            this.pos += 2;
          } else {
            pushLiteral(nodes, ch);
            this.pos++;
          }
          break;
        default:
          pushLiteral(nodes, ch);
          this.pos++;
      }
    }

    return nodes;
  }

  /** Parse `op(...)` at the current position; null (position unchanged) if unterminated. */
  private parseGroup(op: GroupOp): GroupNode | null {
    const start = this.pos;
    this.pos += 2;
    const alternatives: GlobNode[][] = [];

    while (true) {
      alternatives.push(this.parseSequence(true));
      if (this.pos >= this.source.length) {
        this.pos = start;
        return null;
      }
      const ch = this.source[this.pos];
      this.pos++;
      if (ch === ')') {
        return { type: 'group', op, alternatives };
      }
      // ch === '|': next alternative
    }
  }

  /** Parse a bracket expression; null (position unchanged) if unterminated. */
  private parseClass(): GlobNode | null {
    const src = this.source;
    let i = this.pos + 1;
    let negated = false;
    if (src[i] === '!' || src[i] === '^') {
      negated = true;
      i++;
    }

    const members: ClassMember[] = [];
    let first = true;

    while (i < src.length) {
      let ch = codePointAt(src, i);

      if (ch === ']' && !first) {
        this.pos = i + 1;
        return { type: 'class', negated, members };
      }
      first = false;

      if (ch === '[' && src[i + 1] === ':') {
        const end = src.indexOf(':]', i + 2);
        const name = end === -1 ? '' : src.slice(i + 2, end);
        if (isPosixClass(name)) {
          members.push({ kind: 'posix', name });
          i = end + 2;
          continue;
        }
      }

      if (ch === '\\' && i + 1 < src.length) {
        ch = codePointAt(src, i + 1);
        i += 1 + ch.length;
      } else {
        i += ch.length;
      }

      if (src[i] === '-' && i + 1 < src.length && src[i + 1] !== ']') {
        let to = codePointAt(src, i + 1);
        if (to === '\\' && i + 2 < src.length) {
          to = codePointAt(src, i + 2);
          i += 2 + to.length;
        } else {
          i += 1 + to.length;
        }
        members.push({ kind: 'range', from: ch, to });
      } else {
        members.push({ kind: 'char', char: ch });
      }
    }

    return null;
  }
}

function pushLiteral(nodes: GlobNode[], text: string): void {
  const last = nodes[nodes.length - 1];
  if (last?.type === 'literal') {
    last.text += text;
  } else {
    nodes.push({ type: 'literal', text });
  }
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function classMatches(members: ClassMember[], ch: string): boolean {
  return members.some((member) => {
    switch (member.kind) {
      case 'char':
        return member.char === ch;
      case 'range': {
        const code = ch.codePointAt(0) ?? -1;
        return code >= (member.from.codePointAt(0) ?? 0) && code <= (member.to.codePointAt(0) ?? -1);
      }
      case 'posix':
        return POSIX_CLASSES[member.name].test(ch);
    }
  });
}

/**
 * Backtracking matcher: every node maps a set of start offsets to the set of
 * offsets where a match of that node can end. Offsets inside a surrogate pair
 * are never produced by `*`.
 */
class GlobMatcher {
  private readonly groupCache = new Map<GroupNode, Map<number, Set<number>>>();

  constructor(private readonly text: string) {}

  matches(nodes: GlobNode[]): boolean {
    return this.sequenceEnds(nodes, 0).has(this.text.length);
  }

  private sequenceEnds(nodes: GlobNode[], start: number): Set<number> {
    let positions = new Set<number>([start]);
    for (const node of nodes) {
      positions = this.stepEnds(node, positions);
      if (positions.size === 0) break;
    }
    return positions;
  }

  private stepEnds(node: GlobNode, starts: Set<number>): Set<number> {
    // A star from the earliest start covers the ends of every later one
    if (node.type === 'star') {
      let earliest = this.text.length;
      for (const pos of starts) {
        earliest = Math.min(earliest, pos);
      }
      return new Set(this.range(earliest));
    }
    if (node.type === 'group' && node.op === '!') {
      return this.negatedEnds(node, starts);
    }

    const next = new Set<number>();
    for (const pos of starts) {
      for (const end of this.nodeEnds(node, pos)) {
        next.add(end);
      }
    }
    return next;
  }

  private nodeEnds(node: GlobNode, pos: number): Iterable<number> {
    const text = this.text;
    switch (node.type) {
      case 'literal':
        return text.startsWith(node.text, pos) ? [pos + node.text.length] : [];
      case 'any':
        return pos < text.length ? [pos + codePointAt(text, pos).length] : [];
      case 'star':
        return this.range(pos);
      case 'class': {
        const ch = codePointAt(text, pos);
        return ch !== '' && classMatches(node.members, ch) !== node.negated ? [pos + ch.length] : [];
      }
      case 'group':
        return this.groupEnds(node, pos);
    }
  }

  private groupEnds(node: GroupNode, pos: number): Iterable<number> {
    switch (node.op) {
      case '@':
        return this.alternativeEnds(node, pos);
      case '?':
        return new Set([pos, ...this.alternativeEnds(node, pos)]);
      case '+':
        return this.repeat(node, pos, false);
      case '*':
        return this.repeat(node, pos, true);
      case '!':
        return this.negatedEnds(node, [pos]);
    }
  }

  /**
   * Ends reachable from some start that no alternative of `node` reaches from
   * that same start
   */
  private negatedEnds(node: GroupNode, starts: Iterable<number>): Set<number> {
    const [first, ...rest] = [...starts].sort((a, b) => a - b);
    const result = new Set<number>();
    if (first === undefined) return result;

    // Ends rejected from every start seen so far, ascending
    let rejected: number[] = [];
    const matched = this.alternativeEnds(node, first);
    for (const end of this.range(first)) {
      if (matched.has(end)) {
        rejected.push(end);
      } else {
        result.add(end);
      }
    }

    for (const start of rest) {
      const last = rejected.at(-1);
      if (last === undefined || start > last) break;
      const ends = this.alternativeEnds(node, start);
      rejected = rejected.filter((end) => {
        if (end < start || ends.has(end)) return true;
        result.add(end);
        return false;
      });
    }
    return result;
  }

  private alternativeEnds(node: GroupNode, pos: number): Set<number> {
    let byStart = this.groupCache.get(node);
    if (!byStart) {
      byStart = new Map();
      this.groupCache.set(node, byStart);
    }
    const cached = byStart.get(pos);
    if (cached) return cached;

    const ends = new Set<number>();
    for (const alternative of node.alternatives) {
      for (const end of this.sequenceEnds(alternative, pos)) {
        ends.add(end);
      }
    }
    byStart.set(pos, ends);
    return ends;
  }

  private repeat(node: GroupNode, pos: number, allowEmpty: boolean): Set<number> {
    const result = new Set<number>(allowEmpty ? [pos] : []);
    const visited = new Set<number>([pos]);
    const queue = [pos];

    while (queue.length > 0) {
      const start = queue.shift();
      if (start === undefined) break;
      for (const end of this.alternativeEnds(node, start)) {
        result.add(end);
        if (!visited.has(end)) {
          visited.add(end);
          queue.push(end);
        }
      }
    }
    return result;
  }

  private range(from: number): number[] {
    const text = this.text;
    const ends: number[] = [];
    for (let i = from; i <= text.length; i++) {
      if (!isLowSurrogate(text.charCodeAt(i)) || !isHighSurrogate(text.charCodeAt(i - 1))) {
        ends.push(i);
      }
    }
    return ends;
  }
}

const compiled = new Map<string, GlobNode[]>();

/**
 * Parse a pattern into its node list (cached per pattern string)
 */
export function parseGlob(pattern: string): GlobNode[] {
  let nodes = compiled.get(pattern);
  if (!nodes) {
    nodes = new GlobParser(pattern).parse();
    compiled.set(pattern, nodes);
  }
  return nodes;
}

/**
 * Test whether the whole of `text` matches `pattern`
 */
export function matchGlob(pattern: string, text: string): boolean {
  return new GlobMatcher(text).matches(parseGlob(pattern));
}
