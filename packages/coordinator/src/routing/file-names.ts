import { extname, parse } from 'node:path';

/**
 * Output, archive and quarantine names. `timestamp` is `yyyyMMdd_HHmmss`.
 */

export const TEMP_SUFFIX = '.tmp';

/** `{base}_Transformed_{ts}.xml` */
export function outputFileName(sourceFileName: string, timestamp: string): string {
  return `${parse(sourceFileName).name}_Transformed_${timestamp}.xml`;
}

/** `{base}_{ts}{ext}` */
export function archiveFileName(sourceFileName: string, timestamp: string): string {
  return `${parse(sourceFileName).name}_${timestamp}${extname(sourceFileName)}`;
}

/** `{base}_{ts}_ERROR{ext}` */
export function errorFileName(sourceFileName: string, timestamp: string): string {
  return `${parse(sourceFileName).name}_${timestamp}_ERROR${extname(sourceFileName)}`;
}

/** `{base}_{ts}_ERROR.txt` */
export function errorSidecarFileName(sourceFileName: string, timestamp: string): string {
  return `${parse(sourceFileName).name}_${timestamp}_ERROR.txt`;
}

/**
 * Hidden partial output, renamed into place once fully written
 */
export function tempOutputFileName(finalName: string): string {
  return `.${finalName}${TEMP_SUFFIX}`;
}

/**
 * Input files the coordinator picks up (`.xml`, any case)
 */
export function isInputFileName(fileName: string): boolean {
  return extname(fileName).toLowerCase() === '.xml';
}
