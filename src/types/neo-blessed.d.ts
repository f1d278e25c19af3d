// neo-blessed ships no typings of its own; its API is the blessed one.
declare module "neo-blessed" {
  import * as blessed from "blessed";
  export * from "blessed";
  export default blessed;
}
