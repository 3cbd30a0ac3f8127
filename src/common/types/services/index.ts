export * from "./base.types";
export * from "./mixins";
