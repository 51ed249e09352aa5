import type { VFSError } from "../vfs/VFS.js";

export type IntrospectionError = {
  type: "introspection";
  node: string;
  message: string;
};

export type PropertyReadError = {
  type: "propertyRead";
  node: string;
  property: string;
  message: string;
};

export type CoercionError = { type: "coercion"; message: string };

export type WriteError = { type: "write"; path: string; cause: VFSError };

export type ExportError =
  | IntrospectionError
  | PropertyReadError
  | CoercionError
  | WriteError;

const describeVFSError = (error: VFSError): string => {
  switch (error.type) {
    case "notFound":
      return "directory not found";
    case "permissionDenied":
      return "permission denied";
    case "unknown":
      return error.message;
  }
};

export function formatExportError(error: ExportError): string {
  switch (error.type) {
    case "introspection":
      return `Cannot list properties of ${displayNodeName(error.node)}: ${error.message}`;
    case "propertyRead":
      return `Cannot read "${error.property}" of ${displayNodeName(error.node)}: ${error.message}`;
    case "coercion":
      return `Cannot render value as text: ${error.message}`;
    case "write":
      return `Cannot write ${error.path}: ${describeVFSError(error.cause)}`;
  }
}

export function displayNodeName(name: string): string {
  return name === "" ? "<unnamed>" : `"${name}"`;
}
