// The package entry runs a self-test when imported as ESM; the library
// file under lib/ is the same function without it.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdfParse from "pdf-parse";
  export default pdfParse;
}
