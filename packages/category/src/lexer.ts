import { createToken, Lexer } from 'chevrotain';

export const LParen = createToken({ name: 'LParen', pattern: /\(/ });
export const RParen = createToken({ name: 'RParen', pattern: /\)/ });
export const Backslash = createToken({ name: 'Backslash', pattern: /\\/ });
export const Slash = createToken({ name: 'Slash', pattern: /\// });
// Everything else, feature brackets included, belongs to an atomic label.
export const BaseLabel = createToken({ name: 'BaseLabel', pattern: /[^()\\/]+/ });

export const categoryTokens = [LParen, RParen, Backslash, Slash, BaseLabel];

export const CategoryLexer = new Lexer(categoryTokens, {
  positionTracking: 'onlyOffset',
  safeMode: true,
});
