import os from "os";
import path from "path";

//
// Expands $VAR and ${VAR} references, then a leading ~, and makes the path absolute.
// Unknown variables are left as they are.
//
export function expandLocalPath(location: string, env: NodeJS.ProcessEnv = process.env): string {
    let expanded = location.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g, (match: string, braced: string | undefined, bare: string | undefined) => {
        const value = env[braced ?? bare ?? ""];
        return value === undefined ? match : value;
    });

    if (expanded === "~" || expanded.startsWith("~/") || expanded.startsWith("~\\")) {
        expanded = path.join(os.homedir(), expanded.slice(1));
    }

    return path.resolve(expanded);
}
