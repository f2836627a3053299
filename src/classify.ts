/// # symbol classification
///
/// type strings coming from outside the documented package (`typing`,
/// `collections.abc`, `numpy`, …) carry no link information of their own.
/// we still want `Optional` and `numpy.ndarray` to link to their upstream
/// documentation, so each identifier found in such a string is sorted into
/// one of three buckets:
///
/// - **plain**: render as text. builtins like `int`, constants like `None`,
///   and anything we don't recognize.
/// - **data**: link as a data-like object (`typing.Optional` is documented
///   as data, not as a class, in the python docs inventory).
/// - **class**: link as a class.
///
/// the tables are fixed. `classify` never fails: every string, the empty
/// one included, lands in exactly one bucket.

export type Classification =
  | { kind: "plain" }
  | { kind: "data"; target: string }
  | { kind: "class"; target: string };

/// modules whose members we link out to. `builtins` is on the list only so
/// that `builtins.int` is recognized and then deliberately left unlinked.
export const externalModules: ReadonlySet<string> = new Set([
  "builtins",
  "typing",
  "collections",
  "collections.abc",
  "typing_extensions",
  "decimal",
  "datetime",
  "pathlib",
  "numpy",
  "numpy.typing",
]);

const unlinkedModule = "builtins";

/// `None`, `True` and `False` aren't in any inventory.
export const specialConstants: ReadonlySet<string> = new Set(["None", "True", "False"]);

/// members of `typing` that are documented as data rather than classes.
const typingDataNames = [
  "Any",
  "Optional",
  "Literal",
  "LiteralString",
  "AnyStr",
  "NoReturn",
  "Never",
  "Self",
  "TypeAlias",
  "ClassVar",
  "Final",
];

/// per-module suffixes that link as data. every other member of an external
/// module links as a class.
const dataMembers: ReadonlyMap<string, ReadonlySet<string>> = new Map([["typing", new Set(typingDataNames)]]);

/// ## bare names
///
/// a name with no dots can still be recognizable. these four tables are
/// disjoint.

export const bareBuiltins: ReadonlySet<string> = new Set([
  "int",
  "str",
  "float",
  "bool",
  "bytes",
  "list",
  "dict",
  "tuple",
  "set",
  "frozenset",
  "type",
  "object",
  "complex",
]);

export const bareDataNames: ReadonlySet<string> = new Set(typingDataNames);

export const bareClassNames: ReadonlySet<string> = new Set(["Union", "TypeVar", "Generic", "Protocol"]);

export const bareAbstractCollections: ReadonlySet<string> = new Set([
  "Sequence",
  "Mapping",
  "Callable",
  "Iterable",
  "Iterator",
  "Collection",
  "Container",
  "MutableSequence",
  "MutableMapping",
]);

const plain: Classification = { kind: "plain" };

/// ## classify
///
/// dotted names are matched against the external modules by their longest
/// prefix, counted in whole components: `numpy.typing.NDArray` belongs to
/// `numpy.typing`, not `numpy`. the link target is always the full name as
/// written; only the last component decides data versus class.

export function classify(name: string): Classification {
  if (specialConstants.has(name)) {
    return plain;
  }

  if (name.includes(".")) {
    const parts = name.split(".");
    for (let k = parts.length; k > 0; k--) {
      const module = parts.slice(0, k).join(".");
      if (!externalModules.has(module)) continue;
      if (module === unlinkedModule) return plain;

      const member = parts[parts.length - 1];
      const isData = dataMembers.get(module)?.has(member) ?? false;
      return isData ? { kind: "data", target: name } : { kind: "class", target: name };
    }
    return plain;
  }

  if (bareBuiltins.has(name)) return plain;
  if (bareDataNames.has(name)) return { kind: "data", target: `typing.${name}` };
  if (bareClassNames.has(name)) return { kind: "class", target: `typing.${name}` };
  if (bareAbstractCollections.has(name)) return { kind: "class", target: `collections.abc.${name}` };
  return plain;
}
