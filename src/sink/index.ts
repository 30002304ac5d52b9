export { writeRowsCsv, rowsToCsv, escapeCsvField } from './csvWriter';
export { summarizeRows, printSummary } from './summary';
