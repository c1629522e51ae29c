import { defineConfig } from "./src/config";

export default defineConfig({
  title: "Notes from the Reef",
  baseURL: "https://www.example.com/",
  domain: "www.example.com",
  description: "Benchmarks, statistics and debugging write-ups.",
  author: "Reef Notes",
  languageCode: "en-us",
  theme: "light",
  paginate: 10,
  mainSections: ["posts"],
});
