// Folder that interactive mode lists G-code files from.
export const INPUT_FOLDER = 'input'

// Folder that modified files are written to.
export const OUTPUT_FOLDER = 'output'

// Prefix added to the input file name to build the output file name.
export const OUTPUT_PREFIX = 'angledholes_'

export const GCODE_EXTENSION = '.gcode'

export const REMOVED_COMMENT_PREFIX = '; Removed by angled Swiss cheese hole at'

export const SUMMARY_COMMENT_PREFIX = '; Total moves removed by angled Swiss cheese holes:'
