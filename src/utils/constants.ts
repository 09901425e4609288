// Keys handed out by add() and by positional construction start here
export const FIRST_LIST_INDEX = 0;

// Proxy property names matching this address the integer key instead of the string
export const CANONICAL_INTEGER_PATTERN = /^(?:0|-?[1-9][0-9]*)$/;

// Strings compare_regular treats as numbers: optional sign, digits, optional fraction and exponent
export const NUMERIC_STRING_PATTERN = /^\s*[+-]?(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?\s*$/;

export const LIST_REQUIRED_MESSAGE =
  "Cannot add an element to a collection which is not a list. Use Collection.set instead";
