export { formatCell, renderCsv, writeCsvFile } from './csvWriter';
export { atomicWriteText, ensureDir } from './fileHelpers';
