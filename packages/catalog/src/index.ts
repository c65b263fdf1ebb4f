export { classify, roleFromName, SAMPLE_SIZE } from './classify';
export { parseDate, parseNumber, isEmptyCell } from './parse';
export {
  describeFields,
  findField,
  resolveOverride,
  resolveFieldToken,
  detectCostField,
  detectDateField,
  detectIdentifierField,
  detectStatusField,
  detectOriginField,
  detectDestinationField,
} from './fields';
