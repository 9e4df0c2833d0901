export * from "./case_convertor.js"
export * from "./parameter_type.js"
export * from "./signature/index.js"
export * from "./typescript_module/index.js"
