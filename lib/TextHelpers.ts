export function isBlank(v: unknown): boolean {
  if (typeof v === "string") {
    return /^\s*$/.test(v);
  }
  if (Array.isArray(v)) {
    return v.length < 1;
  }
  if (v && typeof v === "object") {
    return Object.keys(v).length < 1;
  }
  return !v;
}

const charsToEncode = " ~`!@#$%^&*()+={}|[]\\/:\":'<>?,.".split("");

export function slugify(txt: string, ch: string = "_"): string {
  let encoded = txt;
  charsToEncode.forEach((char) => {
    encoded = encoded.split(char).join(ch);
  });
  const re = new RegExp(`${ch}+`, "g");
  return encoded.replaceAll(re, ch);
}
