export { getFolioTables, getNumericColumns } from "./schema.js";
