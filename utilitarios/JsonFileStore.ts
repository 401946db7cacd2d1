import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Pela forma e não por `instanceof Error`: erros de fs vêm do realm do
 * Node, que não é o do código quando roda dentro de um vm (Jest).
 */
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

/**
 * Store genérico para persistência em arquivo JSON
 * - Escrita atômica (via .tmp + rename)
 * - Controle de concorrência via fila interna
 * - Leitura segura com fallback para .tmp (recuperação de crash)
 *
 * O conteúdo volta como `unknown[]`; cada repositório revive e valida
 * os próprios registros.
 */
class JsonFileStore {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Lê todos os itens do arquivo
   * Retorna array vazio se nem o arquivo nem o .tmp existem
   */
  async readAll(): Promise<unknown[]> {
    const tmpPath = this.filePath + '.tmp';

    try {
      return this.parse(await fs.readFile(this.filePath, 'utf-8'));
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw error;
      }
    }

    // Arquivo principal não existe: recuperar .tmp de crash durante rename
    try {
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    return this.parse(await fs.readFile(this.filePath, 'utf-8'));
  }

  /**
   * Escreve todos os itens no arquivo
   * - Escrita atômica: escreve em .tmp e depois renomeia
   * - Uma escrita que falhou não impede as seguintes
   */
  async writeAll(items: unknown[]): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tmpPath = this.filePath + '.tmp';

    const write = async (): Promise<void> => {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(items, null, 2), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    };

    this.writeChain = this.writeChain.then(write, write);
    return this.writeChain;
  }

  private parse(raw: string): unknown[] {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) {
      throw new Error(`Conteúdo inválido em ${this.filePath}: esperado array JSON`);
    }
    return parsed;
  }
}

export { JsonFileStore, isErrnoException };
