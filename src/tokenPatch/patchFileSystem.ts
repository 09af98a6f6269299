import fs from 'fs-extra';

/**
 * File operations used by the token patch pipeline. Tests substitute single
 * operations to simulate I/O failures.
 */
export type PatchFileSystem = {
  isFile: (p: string) => Promise<boolean>;
  pathExists: (p: string) => Promise<boolean>;
  copyFile: (src: string, dest: string) => Promise<void>;
  readFile: (p: string) => Promise<string>;
  writeFile: (p: string, content: string) => Promise<void>;
};

export const defaultPatchFileSystem: PatchFileSystem = {
  isFile: async (p) => {
    try {
      return (await fs.stat(p)).isFile();
    } catch {
      return false;
    }
  },
  pathExists: async (p) => await fs.pathExists(p),
  copyFile: async (src, dest) => {
    await fs.copy(src, dest, { preserveTimestamps: true });
  },
  readFile: async (p) => await fs.readFile(p, 'utf8'),
  writeFile: async (p, content) => {
    await fs.writeFile(p, content, 'utf8');
  },
};
