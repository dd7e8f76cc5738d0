/**
 * @fileoverview Help text for the bibsearch CLI
 */

import { CONFIG_FILE_NAME } from '../config/loader.js';

const HELP_TEXT = {
  main: `
bibsearch - federated bibliography search in the terminal

USAGE:
    bibsearch [options]

OPTIONS:
    -f, --config <file>       Config file name or path (default: ${CONFIG_FILE_NAME})
                              A relative name is looked up in the working
                              directory and each of its parents.
    -g, --gen-config          Write an example config to the --config path and exit
    -l, --log <file>          Log file (default: <tmpdir>/<user>_bibsearch.log)
    -k, --keys-output <file>  On ctrl+w, also write the selected keys, comma-separated
    -v, --version             Show version information
    -h, --help                Show this help

KEYS:
    <text>                    Search every source as you type
    enter                     Switch between the search box and the results
    up/down, k/j, ctrl+p/n    Move through the results
    space                     Select or unselect the highlighted result
    @                         Open the highlighted result's URL in the browser
    alt+1..9                  Show or hide the results of source n
    alt+0 / alt+a             Hide all sources / show all sources
    ctrl+w                    Write the selection to the read-write source and exit
    ctrl+c                    Exit without writing anything

CONFIG:
    {
        "sources": [
            { "remote": "dblp.org" },
            { "glob": "~/papers/**/*.bib" },
            { "glob": "reference.bib", "access": "rw" }
        ],
        "keysOutput": "selected_keys.txt"
    }
`,
  config: `
Each source is either a local glob of BibTeX files or a remote endpoint:

    { "glob": "<pattern>", "access": "ro" | "rw", "enabled": true }
    { "remote": "<host or URL>", "enabled": true, "maxHits": 30, "timeoutMs": 10000 }

At most one source may be read-write; on ctrl+w it is rewritten with its own
entries plus every selected entry. "~" and "$VARS" in patterns are expanded.
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(topic: string): topic is HelpTopic {
  return topic in HELP_TEXT;
}

export function getHelp(topic?: string): string {
  return topic && isHelpTopic(topic) ? HELP_TEXT[topic] : HELP_TEXT.main;
}
