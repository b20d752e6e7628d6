import * as fs from 'node:fs';

type PathLike = fs.PathLike;
type ReadFileOptions = { encoding: BufferEncoding; flag?: fs.OpenMode; signal?: AbortSignal; }

// Interface for the file system operations the catalog loader needs
export default interface FileSystem {
    // Use types compatible with fs.promises.readFile, specifically aiming for string result
    readFile(path: PathLike, options: ReadFileOptions | BufferEncoding): Promise<string>;
}
