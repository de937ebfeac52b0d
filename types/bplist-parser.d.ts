declare module "bplist-parser" {
  /** 解析 binary property list，回傳最上層物件的陣列 */
  export function parseBuffer(buffer: Buffer): unknown[];
  export function parseFile(
    fileNameOrBuffer: string | Buffer,
    callback?: (error: Error | null, result?: unknown[]) => void
  ): Promise<unknown[]>;
  export const maxObjectSize: number;
  export const maxObjectCount: number;
}
