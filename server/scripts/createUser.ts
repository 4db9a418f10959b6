/**
 * Create User
 *
 * Adds a login to the database. Users are provisioned out of band; the API
 * has no sign-up route.
 *
 * Usage: tsx server/scripts/createUser.ts <username> <password> [--admin] [--email=<address>]
 */

import { insertUserSchema } from "@shared/schema";
import { fromZodError } from "zod-validation-error";
import { hashPassword } from "../auth/passwords";
import { loadConfig } from "../config/env";
import { createDb } from "../db";
import { createStorage } from "../storage";

const args = process.argv.slice(2);
const positional = args.filter(arg => !arg.startsWith("--"));

if (positional.length < 2) {
    console.error("Usage: tsx server/scripts/createUser.ts <username> <password> [--admin] [--email=<address>]");
    process.exit(1);
}

const [username, password] = positional;
const emailArg = args.find(arg => arg.startsWith("--email="));

async function main() {
    const config = loadConfig();
    if (!config.databaseUrl) {
        console.error("Error: DATABASE_URL must be set");
        process.exit(1);
    }

    const parsed = insertUserSchema.safeParse({
        username,
        email: emailArg ? emailArg.slice("--email=".length) : null,
        passwordHash: await hashPassword(password),
        role: args.includes("--admin") ? "admin" : "user",
        status: "active",
    });
    if (!parsed.success) {
        console.error(`Error: ${fromZodError(parsed.error).message}`);
        process.exit(1);
    }

    const { db, pool } = createDb(config.databaseUrl);
    try {
        const user = await createStorage(db).createUser(parsed.data);
        console.log(`Created ${user.role} ${user.username} (${user.id})`);
    } finally {
        await pool.end();
    }
}

main()
    .then(() => process.exit(0))
    .catch(error => {
        console.error("Failed to create user:", error);
        process.exit(1);
    });
