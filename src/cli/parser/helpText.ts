/**
 * Help text for the harness
 */

export const PROGRAM_NAME = 'syntax-test-helper';

export function getMainHelp(): string {
  return `Utility to test syntax tree deserialization, incremental transfer and
token classification.

USAGE:
  ${PROGRAM_NAME} <action> [arguments]

ACTIONS (must specify one):
  -deserialize
        Deserialize a full pre-edit syntax tree (-pre-edit-tree) and write
        the source representation of the syntax tree to an out file (-out).
  -deserialize-incremental
        Deserialize a full pre-edit syntax tree (-pre-edit-tree), parse an
        incrementally transferred post-edit syntax tree (-incr-tree) and
        write the source representation of the post-edit syntax tree to an
        out file (-out).
  -classify-syntax
        Parse the given source file (-source-file) and output it with
        tokens classified for syntax colouring.
  -print-source
        Parse the given source file (-source-file) and print it with every
        syntax node wrapped in tags naming the node's type.
  -help
        Print this help message

  If several actions are given, the first one in this order runs:
  -deserialize-incremental, -classify-syntax, -deserialize, -print-source,
  -help.

ARGUMENTS:
  -source-file FILENAME
        The path to a source file to parse
  -pre-edit-tree FILENAME
        The path to a serialized pre-edit syntax tree
  -incr-tree FILENAME
        The path to a serialized incrementally transferred post-edit
        syntax tree
  -serialization-format {json,byteTree} [default: json]
        The format that shall be used to serialize/deserialize the syntax
        tree. Defaults to json.
  -out FILENAME
        The file to which the source representation of the post-edit syntax
        tree shall be written.
  -swiftc FILENAME
        If specified, the path to the swiftc executable to parse the file.
        If not specified, swiftc will be looked up from PATH.

ENVIRONMENT:
  SYNTAX_TEST_DEBUG=1   Log debug details to stderr

EXIT CODES:
  0                     Success
  1                     Invalid arguments, file errors or toolkit failures
`;
}

export function getHelpHint(): string {
  return `Run ${PROGRAM_NAME} -help for more help.`;
}
