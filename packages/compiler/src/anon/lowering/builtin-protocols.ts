import type { ProtocolDecl } from "../ir.js";
import { namedType } from "../ir.js";

// Protocols whose requirements the compiler can derive for any struct.
export const DEFAULT_DERIVABLE_PROTOCOLS: readonly string[] = Object.freeze(["Equatable", "Hashable"]);

export function builtinProtocols(): readonly ProtocolDecl[] {
  return [
    {
      name: "Equatable",
      inherits: [],
      requirements: [
        {
          kind: "method",
          name: "equals",
          signature: {
            params: [{ name: "other", type: { kind: "self" } }],
            result: namedType("boolean"),
            mutating: false,
            throws: false,
          },
        },
      ],
    },
    {
      name: "Hashable",
      inherits: ["Equatable"],
      requirements: [
        {
          kind: "readonly-property",
          name: "hashValue",
          signature: { params: [], result: namedType("number"), mutating: false, throws: false },
        },
      ],
    },
  ];
}
