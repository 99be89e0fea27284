/**
 * Chart colours for the departments commonly found in the input sheets.
 */
const DEPARTMENT_COLORS: ReadonlyMap<string, string> = new Map([
  ['Vertrieb', '#3B82F6'],
  ['Marketing', '#F59E0B'],
  ['IT', '#10B981'],
  ['HR', '#EC4899'],
  ['Finance', '#8B5CF6'],
  ['Operations', '#EF4444'],
  ['Customer Support', '#06B6D4'],
  ['Produkt', '#84CC16'],
  ['Einkauf', '#F97316'],
  ['Recht', '#6366F1'],
  ['Sonstige', '#9CA3AF'],
]);

export const FALLBACK_DEPARTMENT_COLOR = '#9CA3AF';

export const departmentColor = (department: string): string =>
  DEPARTMENT_COLORS.get(department) ?? FALLBACK_DEPARTMENT_COLOR;

export const departmentColors = (departments: readonly string[]): Record<string, string> =>
  Object.fromEntries(departments.map((department) => [department, departmentColor(department)]));
