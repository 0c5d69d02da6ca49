export { inferArrowType, tableFromArrow, tableToArrow } from "./convert";
export { ArrowConversionError } from "./errors";
