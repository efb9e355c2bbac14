/**
 * Shared by extraction, step explanations and tutor answers so the client can
 * render every stored string with the same inline-math delimiter.
 */
export const MATH_FORMATTING_RULES = String.raw`MATHEMATICAL EXPRESSION FORMATTING:
- For ALL mathematical expressions, equations, formulas, and symbols, use LaTeX syntax enclosed in single dollar signs
- Examples:
  * For inline expressions: $x^2 + 3x - 2 = 0$
  * For fractions: $\frac{a}{b}$
  * For integrals: $\int_{a}^{b} f(x) dx$
  * For square roots: $\sqrt{x}$
  * For subscripts: $a_1, a_2, a_3$
  * For superscripts: $x^n$
- Always use proper LaTeX syntax for mathematical symbols: $\pi$, $\theta$, $\sum$, $\prod$, etc.
- Always include LaTeX formatting even for simple expressions like $5 + 3 = 8$ or $x = 2$`;
