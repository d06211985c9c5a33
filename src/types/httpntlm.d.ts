// httpntlm ships plain JavaScript without type declarations.
declare module "httpntlm" {
  export type NtlmOptions = {
    username: string;
    password: string;
    domain?: string;
    workstation?: string;
  };

  export type NtlmType2Message = {
    signature: Buffer;
    type: number;
    negotiateFlags: number;
    serverChallenge: Buffer;
    targetInfo?: unknown;
  };

  export const ntlm: {
    createType1Message(options: NtlmOptions): string;
    parseType2Message(rawMessage: string, callback: (error: Error) => void): NtlmType2Message | null;
    createType3Message(type2Message: NtlmType2Message, options: NtlmOptions): string;
  };
}
