export { printTable } from './table';
export { ReportRenderer, type CheckRenderOptions } from './renderer';
