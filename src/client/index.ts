export * from "./onedrive-client";
