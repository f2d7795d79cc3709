import path from 'path';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Name of the copy saved when a file changed behind the editor's back,
 * in the form used by sync clients: `report_conflict-20240115-093000.docx`
 */
export function conflictFileName(filename: string, when: Date = new Date()): string {
  const ext = path.posix.extname(filename);
  const base = filename.slice(0, filename.length - ext.length);
  const stamp =
    `${when.getFullYear()}${pad(when.getMonth() + 1)}${pad(when.getDate())}` +
    `-${pad(when.getHours())}${pad(when.getMinutes())}${pad(when.getSeconds())}`;
  return `${base}_conflict-${stamp}${ext.trim()}`;
}

/**
 * The file was modified by someone else when the editor's save time is
 * unknown, or older than the file's modification time.
 */
export function hasConflict(savetime: number | undefined, mtime: number | undefined): boolean {
  if (savetime === undefined || mtime === undefined) {
    return true;
  }
  return mtime > savetime;
}
