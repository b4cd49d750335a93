/**
 * A single parameter value as declared in a parameter file.
 * Integers and floats are both carried as numbers.
 */
export type ParamValue = number | string;

/**
 * One block of a parameter file: parameter name → value, in file order.
 */
export type ParameterSet = Map<string, ParamValue>;

/**
 * A column value in the index. `null` means the parameter was absent.
 */
export type CellValue = ParamValue | null;
