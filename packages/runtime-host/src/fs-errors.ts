/** Narrow an unknown error to a Node.js errno exception with one of the given codes. */
export function isNodeError(err: unknown, ...codes: ReadonlyArray<string>): boolean {
  if (err === null || typeof err !== 'object' || !('code' in err)) return false;
  const { code } = err;
  return typeof code === 'string' && codes.includes(code);
}

/** Errno codes under which a search-path directory is treated as absent. */
export const UNREADABLE_DIR_CODES: ReadonlyArray<string> = [
  'ENOENT',
  'ENOTDIR',
  'EACCES',
  'EPERM',
  'ELOOP',
  'ENAMETOOLONG',
];
