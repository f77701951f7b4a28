// The npm `punycode` package ships no types; the trailing slash selects it over Node's
// deprecated built-in module of the same name.
declare module 'punycode/' {
  function toASCII(domain: string): string;
  function toUnicode(domain: string): string;
}
