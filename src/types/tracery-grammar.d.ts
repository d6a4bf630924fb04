// tracery-grammar ships no type declarations; this covers the surface the
// name grammars use.
declare module 'tracery-grammar' {
  export type RuleSet = Record<string, string | string[]>;
  export type Modifier = (s: string, params?: string[]) => string;

  export interface Grammar {
    flatten(rule: string): string;
    addModifiers(modifiers: Record<string, Modifier>): void;
  }

  interface Tracery {
    createGrammar(raw: RuleSet): Grammar;
    baseEngModifiers: Record<string, Modifier>;
    setRng(rng: () => number): void;
  }

  const tracery: Tracery;
  export default tracery;
}
