import fs from "node:fs/promises";
import { constants } from "node:fs";

import { errorCode } from "../application/errors";

// link(2) unavailable across devices or on filesystems without hard links
const NO_HARD_LINK = new Set(["EXDEV", "EPERM", "ENOTSUP", "EOPNOTSUPP", "ENOSYS"]);

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") return false;
    throw err;
  }
}

async function unlinkSourceOrUndo(source: string, destination: string): Promise<void> {
  try {
    await fs.unlink(source);
  } catch (err) {
    await fs.rm(destination, { force: true });
    throw err;
  }
}

/**
 * Moves a file without ever replacing `destination`: a hard link followed by
 * unlink, or an exclusive copy followed by unlink where hard links are not
 * available. Fails with EEXIST when the destination is taken.
 */
export async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await fs.link(source, destination);
  } catch (err) {
    const code = errorCode(err);
    if (code === undefined || !NO_HARD_LINK.has(code)) throw err;
    await fs.copyFile(source, destination, constants.COPYFILE_EXCL);
  }

  await unlinkSourceOrUndo(source, destination);
}
