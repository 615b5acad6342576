import * as fs from "fs";
import { FileSystem } from "./shared/types";

/**
 * FileSystem backed by node's synchronous fs calls
 */
export class NodeFileSystem implements FileSystem {
  exists(path: string): boolean {
    return fs.existsSync(path);
  }

  writeFile(path: string, data: Buffer, mode: number): void {
    fs.writeFileSync(path, data, { mode });
  }

  mkdirAll(path: string, mode: number): void {
    fs.mkdirSync(path, { recursive: true, mode });
  }
}

export default NodeFileSystem;
