import stripAnsi from 'strip-ansi';

export type EventKind = 'disconnect' | 'closed';

export interface KeywordRule {
  pattern: string;
  kind: EventKind;
}

export type DetectedEvent = { kind: EventKind; line: string };

export type ClassifiedEvent = DetectedEvent | { kind: 'none' };

/**
 * Strip terminal escapes and surrounding whitespace so a raw log line can be
 * shown to the operator.
 */
export function sanitizeLine(line: string): string {
  return stripAnsi(line).replace(/\0/g, '').trim();
}

/**
 * Ordered substring matcher: the first rule whose pattern occurs in the
 * line decides the kind.
 */
export class EventClassifier {
  private readonly rules: readonly KeywordRule[];

  constructor(rules: readonly KeywordRule[]) {
    this.rules = rules.filter(rule => rule.pattern.length > 0);
  }

  classify(line: string): ClassifiedEvent {
    for (const rule of this.rules) {
      if (line.includes(rule.pattern)) {
        return { kind: rule.kind, line: sanitizeLine(line) };
      }
    }
    return { kind: 'none' };
  }
}
