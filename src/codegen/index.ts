/**
 * Code generation: emitters for C++, Java with JNI, and Rust, plus the
 * writer that puts their output on disk.
 *
 * @packageDocumentation
 */

export type {
  CppEmitOptions,
  GeneratedFile,
  JavaEmitOptions,
  RustEmitOptions,
  TargetLanguage,
} from './types.js';
export { CodeWriter, DEFAULT_INDENT } from './code-writer.js';
export {
  camelCaseToSnakeCase,
  enumTypeName,
  enumValues,
  GENERATED_FILE_BANNER,
  moduleClassName,
  modulePackage,
  propertyIdentifier,
  propertyKey,
  quoteString,
  snakeCaseToCamelCase,
} from './naming.js';
export {
  cppNamespace,
  cppTypeName,
  generateCppFiles,
  generateCppHeader,
  generateCppSource,
  headerIncludeGuard,
} from './cpp-generator.js';
export {
  generateJavaClass,
  generateJavaFiles,
  generateJniLibrary,
  javaFormattingExpression,
  javaParsingExpression,
  javaTypeName,
} from './java-generator.js';
export {
  generateRustFiles,
  generateRustSource,
  rustAcceptType,
  rustElementType,
  rustEnumTypeName,
  rustFunctionName,
  rustKeyConstant,
  rustReturnType,
} from './rust-generator.js';
export { OutputWriteError, writeGeneratedFiles } from './output.js';
