export { formatNumber, formatText, formatGeneral, formatCompiled, compileFormat, isDateFormat } from "./format.js";
export type { CompiledFormat, FormattedValue } from "./format.js";
export { getFormatCode, BUILTIN_FORMATS } from "./table.js";
