/**
 * Recursive-descent parser for slash-notation categories
 *
 *   category := forward ('\' forward)*
 *   forward  := atom ('/' atom)*
 *   atom     := BaseLabel | '(' category ')'
 *
 * Both slash chains fold to the left: in `A/B/C` the accumulated `A/B` becomes
 * the consequence and `C` the antecedent of the outer functor.
 */

import { EmbeddedActionsParser } from 'chevrotain';
import { CategorySyntaxError } from './errors.js';
import { Backslash, BaseLabel, CategoryLexer, LParen, RParen, Slash, categoryTokens } from './lexer.js';
import { baseCategory, leftFunctor, rightFunctor, type CategoryNode } from './types.js';

/** `S[m]` → `Sm` */
export function stripFeatureBrackets(label: string): string {
  return label.replace(/[[\]]/g, '');
}

class CategoryGrammar extends EmbeddedActionsParser {
  constructor() {
    super(categoryTokens);
    this.performSelfAnalysis();
  }

  public category = this.RULE('category', (): CategoryNode => {
    let result = this.SUBRULE(this.forward);
    this.MANY(() => {
      this.CONSUME(Backslash);
      const antecedent = this.SUBRULE2(this.forward);
      result = leftFunctor(antecedent, result);
    });
    return result;
  });

  private forward = this.RULE('forward', (): CategoryNode => {
    let result = this.SUBRULE(this.atom);
    this.MANY(() => {
      this.CONSUME(Slash);
      const antecedent = this.SUBRULE2(this.atom);
      result = rightFunctor(antecedent, result);
    });
    return result;
  });

  private atom = this.RULE('atom', (): CategoryNode =>
    this.OR([
      { ALT: () => baseCategory(stripFeatureBrackets(this.CONSUME(BaseLabel).image)) },
      {
        ALT: () => {
          this.CONSUME(LParen);
          const inner = this.SUBRULE(this.category);
          this.CONSUME(RParen);
          return inner;
        },
      },
    ]),
  );
}

const grammar = new CategoryGrammar();

/**
 * Parse a category string into its AST.
 * @throws CategorySyntaxError when the text is not a well-formed category
 */
export function parseCategory(text: string): CategoryNode {
  const lexed = CategoryLexer.tokenize(text);
  const lexError = lexed.errors[0];
  if (lexError) {
    throw new CategorySyntaxError(text, lexError.offset, lexError.message);
  }

  grammar.input = lexed.tokens;
  const node = grammar.category();

  const parseError = grammar.errors[0];
  if (parseError) {
    const offset = Number.isNaN(parseError.token.startOffset) ? text.length : parseError.token.startOffset;
    throw new CategorySyntaxError(text, offset, parseError.message);
  }

  return node;
}
