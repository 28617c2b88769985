/**
 * compileValidate - runtime validator for one struct's params object
 *
 * Per child param: required/non-null check, type check, list length bounds,
 * numeric range, choice membership, then descent into nested struct and union
 * validators. A union value must carry a known "@type" before dispatch.
 */

import type { GenericFunc, LineBuffer, Param, StructBody } from '@styx/types';
import { iterParamsShallow } from '../ir/traverse.js';
import type { Expr, LanguageProvider, TypeCheckKind } from './LanguageProvider.js';
import { paramValueExpr } from './paramValues.js';
import type { SymbolLUT } from './SymbolLUT.js';

const PARAMS = 'params';
const ELEMENT = 'e';

function plural(count: number): string {
  return count === 1 ? '' : 's';
}

function expectedKind(param: Param): TypeCheckKind {
  switch (param.body.kind) {
    case 'string':
      return 'str';
    case 'int':
      return 'int';
    case 'float':
      return 'float';
    case 'bool':
      return 'bool';
    case 'file':
      return 'file';
    case 'struct':
    case 'struct_union':
      return 'dict';
  }
}

function expectedTypeName(lang: LanguageProvider, kind: TypeCheckKind): string {
  switch (kind) {
    case 'str':
      return lang.typeStr();
    case 'int':
      return lang.typeInt();
    case 'float':
      return lang.typeFloat();
    case 'bool':
      return lang.typeBool();
    case 'file':
      return lang.typeInputPath();
    case 'list':
      return 'list';
    case 'dict':
      return 'object';
  }
}

function check(lang: LanguageProvider, failure: Expr, message: string): LineBuffer {
  return lang.ifElse(failure, lang.raiseValidationError(message));
}

function boundsCheck(
  lang: LanguageProvider,
  value: Expr,
  min: number | undefined,
  max: number | undefined,
  subject: string
): LineBuffer {
  const lo = min === undefined ? undefined : lang.exprLiteral(min);
  const hi = max === undefined ? undefined : lang.exprLiteral(max);
  if (lo !== undefined && hi !== undefined) {
    return check(
      lang,
      lang.exprOr([lang.exprCompare(value, '<', lo), lang.exprCompare(value, '>', hi)]),
      `${subject} must be between ${min} and ${max} (inclusive)`
    );
  }
  if (lo !== undefined) return check(lang, lang.exprCompare(value, '<', lo), `${subject} must be at least ${min}`);
  if (hi !== undefined) return check(lang, lang.exprCompare(value, '>', hi), `${subject} must be at most ${max}`);
  return [];
}

function lengthCheck(lang: LanguageProvider, param: Param, value: Expr): LineBuffer {
  const { countMin, countMax } = param.list ?? {};
  const name = `Parameter \`${param.base.name}\``;
  const length = lang.exprLength(value);
  if (countMin !== undefined && countMin === countMax) {
    return check(
      lang,
      lang.exprCompare(length, '!=', lang.exprLiteral(countMin)),
      `${name} must contain exactly ${countMin} element${plural(countMin)}`
    );
  }
  if (countMin !== undefined && countMax !== undefined) {
    return boundsCheck(lang, length, countMin, countMax, `${name} element count`);
  }
  if (countMax !== undefined) {
    return check(
      lang,
      lang.exprCompare(length, '>', lang.exprLiteral(countMax)),
      `${name} must contain at most ${countMax} element${plural(countMax)}`
    );
  }
  if (countMin !== undefined) {
    return check(
      lang,
      lang.exprCompare(length, '<', lang.exprLiteral(countMin)),
      `${name} must contain at least ${countMin} element${plural(countMin)}`
    );
  }
  return [];
}

/**
 * Checks on one (non-list) value of `param`.
 */
function elementChecks(lang: LanguageProvider, lut: SymbolLUT, param: Param, value: Expr): LineBuffer {
  const name = `Parameter \`${param.base.name}\``;
  const kind = expectedKind(param);
  const buf: LineBuffer = [
    ...check(
      lang,
      lang.exprNot(lang.exprTypeCheck(value, kind)),
      `${name} has the wrong type, expected ${expectedTypeName(lang, kind)}`
    ),
  ];

  const { body } = param;
  switch (body.kind) {
    case 'int':
    case 'float':
      buf.push(...boundsCheck(lang, value, body.minValue, body.maxValue, name));
      break;
    case 'struct':
      buf.push(lang.exprStatement(lang.exprCallStructValidate(lut, { ...param, body }, value)));
      break;
    case 'struct_union': {
      const tags = body.alts.map(alt => alt.body.publicName ?? alt.body.name);
      const tag = lang.exprGetDiscriminator(value);
      buf.push(
        ...check(lang, lang.exprIsNull(tag), `${name} is missing \`@type\``),
        ...check(
          lang,
          lang.exprNot(lang.exprIn(tag, lang.exprLiteral(tags))),
          `${name} \`@type\` must be one of ${tags.join(', ')}`
        ),
        lang.exprStatement(lang.exprCallUnionValidate(lut, { ...param, body }, value))
      );
      break;
    }
    default:
      break;
  }

  if (param.choices !== undefined) {
    const choices = [...param.choices];
    buf.push(
      ...check(
        lang,
        lang.exprNot(lang.exprIn(value, lang.exprLiteral(choices))),
        `${name} must be one of ${choices.join(', ')}`
      )
    );
  }
  return buf;
}

function paramChecks(lang: LanguageProvider, lut: SymbolLUT, param: Param): LineBuffer {
  const value = paramValueExpr(lang, PARAMS, param);
  const name = `Parameter \`${param.base.name}\``;

  let checks: LineBuffer;
  if (param.list !== undefined) {
    checks = [
      ...check(lang, lang.exprNot(lang.exprTypeCheck(value, 'list')), `${name} has the wrong type, expected list`),
      ...lengthCheck(lang, param, value),
      ...lang.forEach(ELEMENT, value, elementChecks(lang, lut, param, ELEMENT)),
    ];
  } else {
    checks = elementChecks(lang, lut, param, value);
  }

  if (param.nullable) {
    return lang.ifElse(lang.exprIsNotNull(value), checks);
  }
  return [...check(lang, lang.exprIsNull(value), `${name} is required`), ...checks];
}

export function compileValidate(lang: LanguageProvider, struct: Param<StructBody>, lut: SymbolLUT): GenericFunc {
  const body: LineBuffer = check(
    lang,
    lang.exprOr([lang.exprIsNull(PARAMS), lang.exprNot(lang.exprTypeCheck(PARAMS, 'dict'))]),
    'Params object has the wrong type'
  );
  for (const child of iterParamsShallow(struct)) {
    body.push(...paramChecks(lang, lut, child));
  }

  return {
    name: lut.fnStructValidate.get(struct.base.id),
    docstringBody: `Validate parameters. Throws an error if \`params\` is not a valid \`${lut.typeStructParams.get(
      struct.base.id
    )}\` object.`,
    args: [{ name: PARAMS, type: lang.typeAny(), docstring: 'The parameters object to validate.' }],
    body,
  };
}
