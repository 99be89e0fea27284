import { err, ok, type Result } from 'neverthrow';

import { createTypeCoercionError, type TypeCoercionError } from '../errors.js';
import { collapseWhitespace } from '../text.js';

import type { NamedRow, SchemaLayout, TypedRow } from '../types.js';

export interface SplitName {
  readonly firstName: string;
  readonly lastName: string;
}

/**
 * Splits a combined name on its last whitespace boundary.
 *
 * "Anna Maria Schmidt" -> { firstName: "Anna Maria", lastName: "Schmidt" }.
 * A single token becomes the last name. Particle surnames such as
 * "van der Berg" are not recognised and split like any other name.
 */
export const splitFullName = (fullName: string): SplitName => {
  const collapsed = collapseWhitespace(fullName);
  const boundary = collapsed.lastIndexOf(' ');

  if (boundary < 0) {
    return { firstName: '', lastName: collapsed };
  }

  return {
    firstName: collapsed.slice(0, boundary),
    lastName: collapsed.slice(boundary + 1),
  };
};

/**
 * Derives first/last name fields. Existing split columns are only trimmed
 * and whitespace-collapsed, never re-split.
 */
export const splitNames = (
  rows: readonly TypedRow[],
  layout: SchemaLayout
): Result<NamedRow[], TypeCoercionError> => {
  const nameColumn =
    layout.names.mode === 'combined' ? layout.names.name.header : layout.names.lastName.header;

  const named: NamedRow[] = [];

  for (const row of rows) {
    const { names, ...rest } = row;
    const split =
      names.mode === 'combined'
        ? splitFullName(names.fullName)
        : {
            firstName: collapseWhitespace(names.firstName),
            lastName: collapseWhitespace(names.lastName),
          };

    if (split.lastName === '') {
      const raw = names.mode === 'combined' ? names.fullName : names.lastName;
      return err(createTypeCoercionError(row.sourceRow, nameColumn, raw, 'last name is empty'));
    }

    named.push({ ...rest, ...split });
  }

  return ok(named);
};
