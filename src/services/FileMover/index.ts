import type { FileMover, MoveMode } from "./FileMover";
import { FileMoverGit } from "./FileMoverGit";
import { FileMoverRename } from "./FileMoverRename";

export * from "./FileMover";
export { FileMoverGit } from "./FileMoverGit";
export { FileMoverRename } from "./FileMoverRename";

export function createFileMover(mode: MoveMode, directory: string): FileMover {
  switch (mode) {
    case "git":
      return new FileMoverGit(directory);
    case "rename":
      return new FileMoverRename(directory);
  }
}
