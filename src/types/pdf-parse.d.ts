// The package root runs a debug harness when loaded without a parent module;
// the library entry under lib/ is imported directly instead.
declare module "pdf-parse/lib/pdf-parse.js" {
  import type { Options, Result } from "pdf-parse";
  function pdfParse(dataBuffer: Buffer, options?: Options): Promise<Result>;
  export default pdfParse;
}
