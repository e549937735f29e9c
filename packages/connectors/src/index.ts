export * from "./mastodon";
