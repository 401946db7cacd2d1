import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

/**
 * Diretório temporário exclusivo de um teste; serve de dataDir para os
 * repositórios JSON.
 */
export interface TestDataDir {
  dir: string;
  /** Caminho de um arquivo dentro do diretório */
  file: (name: string) => string;
  cleanup: () => Promise<void>;
}

export async function createTestDataDir(prefix: string = 'test'): Promise<TestDataDir> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), `adherence-${prefix}-`));
  return {
    dir,
    file: name => path.join(dir, name),
    // escrita atômica pendente (.tmp) pode segurar o diretório por alguns ms
    cleanup: () => fs.rm(dir, { recursive: true, force: true, maxRetries: 3, retryDelay: 50 })
  };
}
