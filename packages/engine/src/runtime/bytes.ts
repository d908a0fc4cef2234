/**
 * Strings passed between JavaScript and Lua are cut at the first NUL byte,
 * so file contents and command output cross the boundary as hex.
 */
export const HEX_CODEC_SOURCE = String.raw`
local function from_hex(hex)
  return (hex:gsub("%x%x", function(pair)
    return string.char(tonumber(pair, 16))
  end))
end

local function to_hex(bytes)
  return (bytes:gsub(".", function(char)
    return ("%02x"):format(char:byte())
  end))
end
`;

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export function toHex(text: string): string {
  return Buffer.from(text, "utf8").toString("hex");
}

/** Throws a TypeError when the bytes are not valid UTF-8. */
export function fromHex(hex: string): string {
  return utf8.decode(Buffer.from(hex, "hex"));
}
