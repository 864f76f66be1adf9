export const OVERRIDE_MODE_ENV_VAR = 'HTTP_RECORDER_MODE';
export const LOG_LEVEL_ENV_VAR = 'HTTP_RECORDER_LOG_LEVEL';
export const DEFAULT_RECORDINGS_DIR = './recordings';
export const ARCHIVE_EXTENSION = '.har';
export const TRACE_DIR_NAME = 'trace';
export const HAR_VERSION = '1.2';
export const HAR_CREATOR_NAME = 'http-interaction-recorder';
export const HAR_CREATOR_VERSION = '0.1.0';
export const HTTP_VERSION = 'HTTP/1.1';
export const ANONYMIZED_VALUE = '********';
export const MASK_CHAR = '*';
export const FILENAME_REPLACEMENT = '_';
