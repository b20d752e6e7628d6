import * as fs from 'node:fs/promises';
import FileSystem from '../interfaces/fileSystem';

// Implement the FileSystem interface using the real fs/promises module
const realFileSystem: FileSystem = {
    readFile: (path, options) => fs.readFile(path, options),
};
export default realFileSystem;
