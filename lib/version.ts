export const TOOL_NAME = 'commons-export';
export const TOOL_VERSION = '1.0.0';
