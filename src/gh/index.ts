import { createOctokit } from "@/lib/github/createOctokit";

export type GhRest = ReturnType<typeof createOctokit>["rest"];

export const createGh = (auth: string): GhRest => createOctokit({ auth }).rest;
