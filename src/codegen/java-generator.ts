/**
 * Java emitter: a final class with typed getters and setters backed by
 * native methods, and the C++ JNI library that implements and registers
 * those native methods.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import {
  isEnumType,
  isInScope,
  isListType,
  type PropertyIR,
  type Scope,
  type SyspropIR,
} from '../schema/types.js';
import { CodeWriter } from './code-writer.js';
import {
  enumTypeName,
  enumValues,
  GENERATED_FILE_BANNER,
  moduleClassName,
  modulePackage,
  propertyIdentifier,
  propertyKey,
  quoteString,
} from './naming.js';
import type { GeneratedFile, JavaEmitOptions } from './types.js';

const JAVA_IMPORTS = `import android.annotation.SystemApi;

import java.util.ArrayList;
import java.util.function.Function;
import java.util.List;
import java.util.Optional;
import java.util.StringJoiner;

`;

const JAVA_PARSERS_AND_FORMATTERS = `private static Boolean tryParseBoolean(String str) {
    switch (str.toLowerCase()) {
        case "1":
        case "y":
        case "yes":
        case "on":
        case "true":
            return Boolean.TRUE;
        case "0":
        case "n":
        case "no":
        case "off":
        case "false":
            return Boolean.FALSE;
        default:
            return null;
    }
}

private static Integer tryParseInteger(String str) {
    try {
        return Integer.valueOf(str);
    } catch (NumberFormatException e) {
        return null;
    }
}

private static Integer tryParseUInt(String str) {
    try {
        return Integer.parseUnsignedInt(str);
    } catch (NumberFormatException e) {
        return null;
    }
}

private static Long tryParseLong(String str) {
    try {
        return Long.valueOf(str);
    } catch (NumberFormatException e) {
        return null;
    }
}

private static Long tryParseULong(String str) {
    try {
        return Long.parseUnsignedLong(str);
    } catch (NumberFormatException e) {
        return null;
    }
}

private static Double tryParseDouble(String str) {
    try {
        return Double.valueOf(str);
    } catch (NumberFormatException e) {
        return null;
    }
}

private static String tryParseString(String str) {
    return "".equals(str) ? null : str;
}

private static <T extends Enum<T>> T tryParseEnum(Class<T> enumType, String str) {
    try {
        return Enum.valueOf(enumType, str);
    } catch (IllegalArgumentException e) {
        return null;
    }
}

private static <T> List<T> tryParseList(Function<String, T> elementParser, String str) {
    if ("".equals(str)) return null;

    List<T> ret = new ArrayList<>();

    for (String element : str.split(",")) {
        T parsed = elementParser.apply(element);
        if (parsed == null) {
            return null;
        }
        ret.add(parsed);
    }

    return ret;
}

private static <T extends Enum<T>> List<T> tryParseEnumList(Class<T> enumType, String str) {
    return tryParseList(v -> tryParseEnum(enumType, v), str);
}

private static <T> String formatList(List<T> list, Function<T, String> elementFormatter) {
    StringJoiner joiner = new StringJoiner(",");

    for (T element : list) {
        joiner.add(elementFormatter.apply(element));
    }

    return joiner.toString();
}

`;

const JNI_INCLUDES = `#include <cstdint>
#include <iterator>
#include <string>

#include <dlfcn.h>
#include <jni.h>

#include <android-base/logging.h>

`;

const JNI_UTILS = `namespace libc {

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

jstring GetProp(JNIEnv* env, const char* key, const char* legacy = nullptr) {
    auto pi = system_property_find(key);
    if (pi == nullptr && legacy != nullptr) pi = system_property_find(legacy);
    if (pi == nullptr) return env->NewStringUTF("");
    std::string ret;
    system_property_read_callback(pi, [](void* cookie, const char*, const char* value, std::uint32_t) {
        *static_cast<std::string*>(cookie) = value;
    }, &ret);
    return env->NewStringUTF(ret.c_str());
}

}  // namespace libc

class ScopedUtfChars {
  public:
    ScopedUtfChars(JNIEnv* env, jstring s) : env_(env), string_(s) {
        utf_chars_ = env->GetStringUTFChars(s, nullptr);
    }

    ~ScopedUtfChars() {
        if (utf_chars_) {
            env_->ReleaseStringUTFChars(string_, utf_chars_);
        }
    }

    const char* c_str() const {
        return utf_chars_;
    }

  private:
    JNIEnv* env_;
    jstring string_;
    const char* utf_chars_;
};

`;

const JNI_ONLOAD = `jint JNI_OnLoad(JavaVM* vm, void*) {
    JNIEnv* env = nullptr;

    if (vm->GetEnv(reinterpret_cast<void**>(&env), JNI_VERSION_1_6) != JNI_OK) {
        LOG(ERROR) << "GetEnv failed";
        return -1;
    }

    jclass clazz = env->FindClass(kClassName);
    if (clazz == nullptr) {
        LOG(ERROR) << "Cannot find class " << kClassName;
        return -1;
    }

    if (env->RegisterNatives(clazz, methods, std::size(methods)) < 0) {
        LOG(ERROR) << "RegisterNatives failed";
        return -1;
    }

    return JNI_VERSION_1_6;
}
`;

/**
 * Java type used for a property's value.
 */
export function javaTypeName(prop: PropertyIR): string {
  switch (prop.type) {
    case 'Boolean':
      return 'Boolean';
    case 'Integer':
    case 'UInt':
      return 'Integer';
    case 'Long':
    case 'ULong':
      return 'Long';
    case 'Double':
      return 'Double';
    case 'String':
      return 'String';
    case 'Enum':
      return enumTypeName(prop);
    case 'BooleanList':
      return 'List<Boolean>';
    case 'IntegerList':
    case 'UIntList':
      return 'List<Integer>';
    case 'LongList':
    case 'ULongList':
      return 'List<Long>';
    case 'DoubleList':
      return 'List<Double>';
    case 'StringList':
      return 'List<String>';
    case 'EnumList':
      return `List<${enumTypeName(prop)}>`;
  }
}

/**
 * Expression that parses the raw string from the native getter.
 */
export function javaParsingExpression(prop: PropertyIR): string {
  const nativeCall = `native_${propertyIdentifier(prop)}_get()`;

  switch (prop.type) {
    case 'Boolean':
      return `tryParseBoolean(${nativeCall})`;
    case 'Integer':
      return `tryParseInteger(${nativeCall})`;
    case 'UInt':
      return `tryParseUInt(${nativeCall})`;
    case 'Long':
      return `tryParseLong(${nativeCall})`;
    case 'ULong':
      return `tryParseULong(${nativeCall})`;
    case 'Double':
      return `tryParseDouble(${nativeCall})`;
    case 'String':
      return `tryParseString(${nativeCall})`;
    case 'Enum':
      return `tryParseEnum(${enumTypeName(prop)}.class, ${nativeCall})`;
    case 'EnumList':
      return `tryParseEnumList(${enumTypeName(prop)}.class, ${nativeCall})`;
    case 'BooleanList':
      return `tryParseList(v -> tryParseBoolean(v), ${nativeCall})`;
    case 'IntegerList':
      return `tryParseList(v -> tryParseInteger(v), ${nativeCall})`;
    case 'UIntList':
      return `tryParseList(v -> tryParseUInt(v), ${nativeCall})`;
    case 'LongList':
      return `tryParseList(v -> tryParseLong(v), ${nativeCall})`;
    case 'ULongList':
      return `tryParseList(v -> tryParseULong(v), ${nativeCall})`;
    case 'DoubleList':
      return `tryParseList(v -> tryParseDouble(v), ${nativeCall})`;
    case 'StringList':
      return `tryParseList(v -> tryParseString(v), ${nativeCall})`;
  }
}

/**
 * Expression that formats `value` into the string passed to the native setter.
 */
export function javaFormattingExpression(prop: PropertyIR): string {
  switch (prop.type) {
    case 'Boolean':
      return prop.integer_as_bool ? '(value ? "1" : "0")' : 'value.toString()';
    case 'UInt':
      return 'Integer.toUnsignedString(value)';
    case 'ULong':
      return 'Long.toUnsignedString(value)';
    case 'BooleanList':
      return prop.integer_as_bool
        ? 'formatList(value, v -> v ? "1" : "0")'
        : 'formatList(value, v -> v.toString())';
    case 'UIntList':
      return 'formatList(value, v -> Integer.toUnsignedString(v))';
    case 'ULongList':
      return 'formatList(value, v -> Long.toUnsignedString(v))';
    default:
      return isListType(prop.type) ? 'formatList(value, v -> v.toString())' : 'value.toString()';
  }
}

function writeAnnotations(writer: CodeWriter, prop: PropertyIR): void {
  if (prop.deprecated) {
    writer.write('@Deprecated\n');
  }
  switch (prop.scope) {
    case 'System':
      writer.write('@SystemApi\n');
      break;
    case 'Internal':
      writer.write('/** @hide */\n');
      break;
    case 'Public':
      break;
  }
}

/**
 * Generates the Java class.
 *
 * @param ir - The validated property set.
 * @param scope - Highest scope included.
 * @returns Java source text.
 */
export function generateJavaClass(ir: SyspropIR, scope: Scope): string {
  const className = moduleClassName(ir.module);
  const writer = new CodeWriter();

  writer.write(GENERATED_FILE_BANNER);
  writer.write(`package ${modulePackage(ir.module)};\n\n`);
  writer.write(JAVA_IMPORTS);
  writer.write(`public final class ${className} {\n`);
  writer.indent();
  writer.write(`private ${className} () {}\n\n`);
  writer.write('static {\n');
  writer.indent().write(`System.loadLibrary("${className}_jni");\n`).dedent();
  writer.write('}\n\n');
  writer.write(JAVA_PARSERS_AND_FORMATTERS);

  for (const prop of ir.properties) {
    if (!isInScope(prop, scope)) {
      continue;
    }

    const id = propertyIdentifier(prop);
    const type = javaTypeName(prop);

    writer.write('\n');

    if (isEnumType(prop.type)) {
      writeAnnotations(writer, prop);
      writer.write(`public static enum ${enumTypeName(prop)} {\n`);
      writer.indent();
      for (const value of enumValues(prop)) {
        writer.write(`${value},\n`);
      }
      writer.dedent();
      writer.write('}\n\n');
    }

    writeAnnotations(writer, prop);
    writer.write(`public static Optional<${type}> ${id}() {\n`);
    writer.indent().write(`return Optional.ofNullable(${javaParsingExpression(prop)});\n`).dedent();
    writer.write('}\n\n');
    writer.write(`private static native String native_${id}_get();\n`);

    if (prop.access !== 'Readonly') {
      writer.write('\n');
      writeAnnotations(writer, prop);
      writer.write(`public static boolean ${id}(${type} value) {\n`);
      writer.indent().write(`return native_${id}_set(${javaFormattingExpression(prop)});\n`).dedent();
      writer.write('}\n\n');
      writer.write(`private static native boolean native_${id}_set(String str);\n`);
    }
  }

  writer.dedent();
  writer.write('}\n');

  return writer.code();
}

/**
 * Generates the JNI library that backs the Java class's native methods.
 *
 * @param ir - The validated property set.
 * @param scope - Highest scope included.
 * @returns C++ source text.
 */
export function generateJniLibrary(ir: SyspropIR, scope: Scope): string {
  const props = ir.properties.filter((prop) => isInScope(prop, scope));
  const writer = new CodeWriter();

  writer.write(GENERATED_FILE_BANNER);
  writer.write(`#define LOG_TAG "${ir.module}_jni"\n\n`);
  writer.write(JNI_INCLUDES);
  writer.write('namespace {\n\n');
  writer.write(`constexpr const char* kClassName = "${ir.module.replace(/\./g, '/')}";\n\n`);
  writer.write(JNI_UTILS);

  for (const prop of props) {
    const id = propertyIdentifier(prop);
    const key = quoteString(propertyKey(ir, prop));
    const legacy = prop.legacy_prop_name === '' ? '' : `, ${quoteString(prop.legacy_prop_name)}`;

    writer.write(`jstring JNICALL ${id}_get(JNIEnv* env, jclass) {\n`);
    writer.indent().write(`return libc::GetProp(env, ${key}${legacy});\n`).dedent();
    writer.write('}\n\n');

    if (prop.access !== 'Readonly') {
      writer.write(`jboolean JNICALL ${id}_set(JNIEnv* env, jclass, jstring str) {\n`);
      writer
        .indent()
        .write(
          `return libc::system_property_set(${key}, ScopedUtfChars(env, str).c_str()) == 0 ? JNI_TRUE : JNI_FALSE;\n`
        )
        .dedent();
      writer.write('}\n\n');
    }
  }

  writer.write('const JNINativeMethod methods[] = {\n');
  writer.indent();
  for (const prop of props) {
    const id = propertyIdentifier(prop);
    writer.write(
      `{"native_${id}_get", "()Ljava/lang/String;", reinterpret_cast<void*>(${id}_get)},\n`
    );
    if (prop.access !== 'Readonly') {
      writer.write(
        `{"native_${id}_set", "(Ljava/lang/String;)Z", reinterpret_cast<void*>(${id}_set)},\n`
      );
    }
  }
  writer.dedent();
  writer.write('};\n\n');
  writer.write('}  // namespace\n\n');
  writer.write(JNI_ONLOAD);

  return writer.code();
}

/**
 * Generates the Java class and its JNI library.
 *
 * @param ir - The validated property set.
 * @param options - Output directories and scope.
 * @returns `<Class>.java` under the package directory and `<Class>_jni.cpp`.
 */
export function generateJavaFiles(ir: SyspropIR, options: JavaEmitOptions): GeneratedFile[] {
  const className = moduleClassName(ir.module);
  const packageDir = path.join(options.javaOutputDir, ...modulePackage(ir.module).split('.'));

  return [
    {
      path: path.join(packageDir, `${className}.java`),
      content: generateJavaClass(ir, options.scope),
      description: 'generated java class',
    },
    {
      path: path.join(options.jniOutputDir, `${className}_jni.cpp`),
      content: generateJniLibrary(ir, options.scope),
      description: 'generated jni library',
    },
  ];
}
