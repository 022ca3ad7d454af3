/**
 * Fixed error texts of the REST surface. Callers match on these, keep them verbatim.
 */
export const Messages = {
  unauthorized: "Unauthorized",
  parseCommand: "ERR failed to parse command",
  emptyCommand: "ERR empty command",
  parsePipeline: "ERR failed to parse pipeline request",
  emptyPipeline: "ERR empty pipeline request",
  emptyPipelineCommand: "ERR empty pipeline command",
  restTokenSyntax: "ERR invalid syntax. Usage: ACL RESTTOKEN username password",
  genpassReply: "ERR unexpected reply to ACL GENPASS",
  internal: "ERR internal error",
} as const
