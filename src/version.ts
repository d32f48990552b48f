/**
 * Version of the version-sync tool itself, not the version it writes.
 * Keep in step with package.json.
 */
export const TOOL_VERSION = '1.0.0';
