/**
 * C++ emitter: a header declaring one getter (and, for writable properties,
 * one setter) per property, and a source file implementing them on top of
 * libc's system property functions.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { isEnumType, isInScope, type PropertyIR, type Scope, type SyspropIR } from '../schema/types.js';
import { CodeWriter } from './code-writer.js';
import {
  enumTypeName,
  enumValues,
  GENERATED_FILE_BANNER,
  propertyIdentifier,
  propertyKey,
  quoteString,
} from './naming.js';
import type { CppEmitOptions, GeneratedFile } from './types.js';

const HEADER_INCLUDES = `#include <cstdint>
#include <optional>
#include <string>
#include <vector>

`;

const SOURCE_INCLUDES = `#include <cerrno>
#include <cstdlib>
#include <cstring>
#include <iterator>
#include <limits>
#include <type_traits>
#include <utility>

#include <dlfcn.h>
#include <strings.h>

#include <android-base/logging.h>
#include <android-base/parseint.h>
#include <android-base/stringprintf.h>
#include <android-base/strings.h>

`;

const PARSERS_AND_FORMATTERS = `template <typename T> constexpr bool is_vector = false;

template <typename T> constexpr bool is_vector<std::vector<T>> = true;

template <> [[maybe_unused]] std::optional<bool> DoParse(const char* str) {
    static constexpr const char* kYes[] = {"1", "true"};
    static constexpr const char* kNo[] = {"0", "false"};

    for (const char* yes : kYes) {
        if (strcasecmp(yes, str) == 0) return std::make_optional(true);
    }

    for (const char* no : kNo) {
        if (strcasecmp(no, str) == 0) return std::make_optional(false);
    }

    return std::nullopt;
}

template <> [[maybe_unused]] std::optional<std::int32_t> DoParse(const char* str) {
    std::int32_t ret;
    return android::base::ParseInt(str, &ret) ? std::make_optional(ret) : std::nullopt;
}

template <> [[maybe_unused]] std::optional<std::uint32_t> DoParse(const char* str) {
    std::uint32_t ret;
    return android::base::ParseUint(str, &ret) ? std::make_optional(ret) : std::nullopt;
}

template <> [[maybe_unused]] std::optional<std::int64_t> DoParse(const char* str) {
    std::int64_t ret;
    return android::base::ParseInt(str, &ret) ? std::make_optional(ret) : std::nullopt;
}

template <> [[maybe_unused]] std::optional<std::uint64_t> DoParse(const char* str) {
    std::uint64_t ret;
    return android::base::ParseUint(str, &ret) ? std::make_optional(ret) : std::nullopt;
}

template <> [[maybe_unused]] std::optional<double> DoParse(const char* str) {
    int old_errno = errno;
    errno = 0;
    char* end;
    double ret = std::strtod(str, &end);
    if (errno != 0) {
        return std::nullopt;
    }
    if (str == end || *end != '\\0') {
        errno = old_errno;
        return std::nullopt;
    }
    errno = old_errno;
    return std::make_optional(ret);
}

template <> [[maybe_unused]] std::optional<std::string> DoParse(const char* str) {
    return std::make_optional(str);
}

template <typename Vec> [[maybe_unused]] std::optional<Vec> DoParseList(const char* str) {
    Vec ret;
    for (auto&& element : android::base::Split(str, ",")) {
        auto parsed = DoParse<typename Vec::value_type>(element.c_str());
        if (!parsed) {
            return std::nullopt;
        }
        ret.emplace_back(std::move(*parsed));
    }
    return std::make_optional(std::move(ret));
}

template <typename T> inline std::optional<T> TryParse(const char* str) {
    if constexpr(is_vector<T>) {
        return DoParseList<T>(str);
    } else {
        return DoParse<T>(str);
    }
}

[[maybe_unused]] std::string FormatValue(std::int32_t value) {
    return std::to_string(value);
}

[[maybe_unused]] std::string FormatValue(std::uint32_t value) {
    return std::to_string(value);
}

[[maybe_unused]] std::string FormatValue(std::int64_t value) {
    return std::to_string(value);
}

[[maybe_unused]] std::string FormatValue(std::uint64_t value) {
    return std::to_string(value);
}

[[maybe_unused]] std::string FormatValue(double value) {
    return android::base::StringPrintf("%.*g", std::numeric_limits<double>::max_digits10, value);
}

[[maybe_unused]] std::string FormatValue(bool value) {
    return value ? "true" : "false";
}

template <typename T>
[[maybe_unused]] std::string FormatValue(const std::vector<T>& value) {
    std::string ret;

    for (auto&& element : value) {
        if (!ret.empty()) ret.push_back(',');
        if constexpr(std::is_same_v<T, std::string>) {
            ret += element;
        } else {
            ret += FormatValue(element);
        }
    }

    return ret;
}

[[maybe_unused]] std::string FormatBoolListAsInt(const std::vector<bool>& value) {
    std::string ret;

    for (bool element : value) {
        if (!ret.empty()) ret.push_back(',');
        ret.push_back(element ? '1' : '0');
    }

    return ret;
}

`;

const LIBC_UTIL = `namespace libc {

struct prop_info;

const prop_info* (*system_property_find)(const char* name);

void (*system_property_read_callback)(
    const prop_info* pi,
    void (*callback)(void* cookie, const char* name, const char* value, std::uint32_t serial),
    void* cookie
);

int (*system_property_set)(const char* key, const char* value);

void* handle;

__attribute__((constructor)) void load_libc_functions() {
    handle = dlopen("libc.so", RTLD_LAZY | RTLD_NOLOAD);

    system_property_find = reinterpret_cast<decltype(system_property_find)>(dlsym(handle, "__system_property_find"));
    system_property_read_callback = reinterpret_cast<decltype(system_property_read_callback)>(dlsym(handle, "__system_property_read_callback"));
    system_property_set = reinterpret_cast<decltype(system_property_set)>(dlsym(handle, "__system_property_set"));
}

__attribute__((destructor)) void release_libc_functions() {
    dlclose(handle);
}

template <typename T>
std::optional<T> GetProp(const char* key, const char* legacy = nullptr) {
    auto pi = system_property_find(key);
    if (pi == nullptr && legacy != nullptr) pi = system_property_find(legacy);
    if (pi == nullptr) return std::nullopt;
    std::optional<T> ret;
    system_property_read_callback(pi, [](void* cookie, const char*, const char* value, std::uint32_t) {
        *static_cast<std::optional<T>*>(cookie) = TryParse<T>(value);
    }, &ret);
    return ret;
}

}  // namespace libc

`;

/**
 * C++ type used for a property's value.
 */
export function cppTypeName(prop: PropertyIR): string {
  switch (prop.type) {
    case 'Boolean':
      return 'bool';
    case 'Integer':
      return 'std::int32_t';
    case 'UInt':
      return 'std::uint32_t';
    case 'Long':
      return 'std::int64_t';
    case 'ULong':
      return 'std::uint64_t';
    case 'Double':
      return 'double';
    case 'String':
      return 'std::string';
    case 'Enum':
      return enumTypeName(prop);
    case 'BooleanList':
      return 'std::vector<bool>';
    case 'IntegerList':
      return 'std::vector<std::int32_t>';
    case 'UIntList':
      return 'std::vector<std::uint32_t>';
    case 'LongList':
      return 'std::vector<std::int64_t>';
    case 'ULongList':
      return 'std::vector<std::uint64_t>';
    case 'DoubleList':
      return 'std::vector<double>';
    case 'StringList':
      return 'std::vector<std::string>';
    case 'EnumList':
      return `std::vector<${enumTypeName(prop)}>`;
  }
}

/**
 * C++ namespace for a module: dots become `::`.
 */
export function cppNamespace(module: string): string {
  return module.replace(/\./g, '::');
}

/**
 * Include guard of the generated header.
 */
export function headerIncludeGuard(module: string): string {
  return `SYSPROPGEN_${module.replace(/\./g, '_')}_H_`;
}

function setterArgument(prop: PropertyIR): string {
  if (prop.type === 'String') {
    return 'value.c_str()';
  }
  if (prop.integer_as_bool && prop.type === 'Boolean') {
    return 'value ? "1" : "0"';
  }
  if (prop.integer_as_bool && prop.type === 'BooleanList') {
    return 'FormatBoolListAsInt(value).c_str()';
  }
  return 'FormatValue(value).c_str()';
}

/**
 * Generates the header file.
 *
 * @param ir - The validated property set.
 * @param scope - Highest scope included.
 * @returns Header text.
 */
export function generateCppHeader(ir: SyspropIR, scope: Scope): string {
  const writer = new CodeWriter();
  const guard = headerIncludeGuard(ir.module);
  const namespace = cppNamespace(ir.module);

  writer.write(GENERATED_FILE_BANNER);
  writer.write(`#ifndef ${guard}\n#define ${guard}\n\n`);
  writer.write(HEADER_INCLUDES);
  writer.write(`namespace ${namespace} {\n\n`);

  const props = ir.properties.filter((prop) => isInScope(prop, scope));
  props.forEach((prop, index) => {
    if (index > 0) {
      writer.write('\n');
    }

    const id = propertyIdentifier(prop);
    const type = cppTypeName(prop);
    const attribute = prop.deprecated ? '[[deprecated]] ' : '';

    if (isEnumType(prop.type)) {
      writer.write(`enum class ${enumTypeName(prop)} {\n`);
      writer.indent();
      for (const value of enumValues(prop)) {
        writer.write(`${value},\n`);
      }
      writer.dedent();
      writer.write('};\n\n');
    }

    writer.write(`${attribute}std::optional<${type}> ${id}();\n`);
    if (prop.access !== 'Readonly') {
      writer.write(`${attribute}bool ${id}(const ${type}& value);\n`);
    }
  });

  writer.write(`\n}  // namespace ${namespace}\n\n`);
  writer.write(`#endif  // ${guard}\n`);

  return writer.code();
}

/**
 * Generates the source file.
 *
 * @param ir - The validated property set.
 * @param scope - Highest scope included.
 * @param includeName - Name used to include the generated header.
 * @returns Source text.
 */
export function generateCppSource(ir: SyspropIR, scope: Scope, includeName: string): string {
  const writer = new CodeWriter();
  const namespace = cppNamespace(ir.module);
  const props = ir.properties.filter((prop) => isInScope(prop, scope));

  writer.write(GENERATED_FILE_BANNER);
  writer.write(`#include <${includeName}>\n\n`);
  writer.write(SOURCE_INCLUDES);
  writer.write('namespace {\n\n');
  writer.write(`using namespace ${namespace};\n\n`);
  writer.write('template <typename T> std::optional<T> DoParse(const char* str);\n\n');

  for (const prop of props) {
    if (!isEnumType(prop.type)) {
      continue;
    }

    const id = propertyIdentifier(prop);
    const enumName = enumTypeName(prop);

    writer.write(`constexpr const std::pair<const char*, ${enumName}> ${id}_list[] = {\n`);
    writer.indent();
    for (const value of enumValues(prop)) {
      writer.write(`{"${value}", ${enumName}::${value}},\n`);
    }
    writer.dedent();
    writer.write('};\n\n');

    writer.write('template <>\n');
    writer.write(`std::optional<${enumName}> DoParse(const char* str) {\n`);
    writer.indent();
    writer.write(`for (auto [name, val] : ${id}_list) {\n`);
    writer.indent();
    writer.write('if (strcmp(str, name) == 0) {\n');
    writer.indent().write('return val;\n').dedent();
    writer.write('}\n');
    writer.dedent();
    writer.write('}\n');
    writer.write('return std::nullopt;\n');
    writer.dedent();
    writer.write('}\n\n');

    if (prop.access !== 'Readonly') {
      writer.write(`std::string FormatValue(${enumName} value) {\n`);
      writer.indent();
      writer.write(`for (auto [name, val] : ${id}_list) {\n`);
      writer.indent();
      writer.write('if (val == value) {\n');
      writer.indent().write('return name;\n').dedent();
      writer.write('}\n');
      writer.dedent();
      writer.write('}\n');
      writer.write(
        `LOG(FATAL) << "Invalid value " << static_cast<std::int32_t>(value) << " for property " << ${quoteString(propertyKey(ir, prop))};\n`
      );
      writer.write('__builtin_unreachable();\n');
      writer.dedent();
      writer.write('}\n\n');
    }
  }

  writer.write(PARSERS_AND_FORMATTERS);
  writer.write(LIBC_UTIL);
  writer.write('}  // namespace\n\n');
  writer.write(`namespace ${namespace} {\n\n`);

  props.forEach((prop, index) => {
    if (index > 0) {
      writer.write('\n');
    }

    const id = propertyIdentifier(prop);
    const type = cppTypeName(prop);
    const key = quoteString(propertyKey(ir, prop));
    const legacy = prop.legacy_prop_name === '' ? '' : `, ${quoteString(prop.legacy_prop_name)}`;

    writer.write(`std::optional<${type}> ${id}() {\n`);
    writer.indent().write(`return libc::GetProp<${type}>(${key}${legacy});\n`).dedent();
    writer.write('}\n');

    if (prop.access !== 'Readonly') {
      writer.write(`\nbool ${id}(const ${type}& value) {\n`);
      writer
        .indent()
        .write(`return libc::system_property_set(${key}, ${setterArgument(prop)}) == 0;\n`)
        .dedent();
      writer.write('}\n');
    }
  });

  writer.write(`\n}  // namespace ${namespace}\n`);

  return writer.code();
}

/**
 * Generates the header and source for a schema file.
 *
 * @param ir - The validated property set.
 * @param schemaPath - Path of the schema; its basename names the outputs.
 * @param options - Output directories, include name and scope.
 * @returns `<basename>.h` in the header directory and `<basename>.cpp` in
 *   the source directory.
 */
export function generateCppFiles(
  ir: SyspropIR,
  schemaPath: string,
  options: CppEmitOptions
): GeneratedFile[] {
  const basename = path.basename(schemaPath);
  const includeName = options.includeName ?? `${basename}.h`;

  return [
    {
      path: path.join(options.headerOutputDir, `${basename}.h`),
      content: generateCppHeader(ir, options.scope),
      description: 'generated header',
    },
    {
      path: path.join(options.sourceOutputDir, `${basename}.cpp`),
      content: generateCppSource(ir, options.scope, includeName),
      description: 'generated source',
    },
  ];
}
