import fs from "fs";
import path from "path";

export type WriteOptions = { encoding?: BufferEncoding } | BufferEncoding;

export interface FileStorageService {
  fileExists(filePath: string): boolean;

  ensureDir(dirPath: string): void;

  ensureFile(filePath: string, initialContent?: string): void;

  readFile(filePath: string, encoding?: BufferEncoding): string;

  writeFile(filePath: string, content: string, options?: WriteOptions): void;

  appendFile(filePath: string, content: string): void;

  rename(fromPath: string, toPath: string): void;

  removeFile(filePath: string): void;
}

/**
 * Find the repository root by looking for package.json or .git upwards.
 * Falls back to the provided startDir when nothing is found.
 */
export function findRepoRoot(startDir: string): string {
  let currentDir = startDir;
  while ( true ) {
    const hasPkg = fs.existsSync( path.join( currentDir, "package.json" ) );
    const hasGit = fs.existsSync( path.join( currentDir, ".git" ) );
    if ( hasPkg || hasGit ) return currentDir;

    const parent = path.dirname( currentDir );
    if ( parent === currentDir ) return startDir;
    currentDir = parent;
  }
}

/** Root that logs/ and trading_data/ are resolved against */
export function findProjectRoot(startDir: string): string {
  return findRepoRoot( startDir );
}

class NodeFsFileStorageService implements FileStorageService {
  fileExists(filePath: string): boolean {
    try {
      fs.accessSync( filePath, fs.constants.F_OK );
      return true;
    } catch {
      return false;
    }
  }

  ensureDir(dirPath: string): void {
    fs.mkdirSync( dirPath, { recursive: true } );
  }

  ensureFile(filePath: string, initialContent: string = ""): void {
    this.ensureDir( path.dirname( filePath ) );
    if ( this.fileExists( filePath ) ) return;
    try {
      fs.writeFileSync( filePath, initialContent, { encoding: "utf-8", flag: "wx" } );
    } catch ( err ) {
      // another writer created it between the check and the write
      if ( !isErrnoCode( err, "EEXIST" ) ) throw err;
    }
  }

  readFile(filePath: string, encoding: BufferEncoding = "utf-8"): string {
    return fs.readFileSync( filePath, encoding );
  }

  writeFile(filePath: string, content: string, options?: WriteOptions): void {
    fs.writeFileSync( filePath, content, options );
  }

  appendFile(filePath: string, content: string): void {
    fs.appendFileSync( filePath, content, { encoding: "utf-8" } );
  }

  rename(fromPath: string, toPath: string): void {
    fs.renameSync( fromPath, toPath );
  }

  removeFile(filePath: string): void {
    fs.rmSync( filePath, { force: true } );
  }
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

const defaultStorage = new NodeFsFileStorageService();

export function getFileStorage(): FileStorageService {
  return defaultStorage;
}
