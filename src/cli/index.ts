#!/usr/bin/env node
import readline from "readline";
import { loadConfig } from "../config";
import { CommandService } from "../services/commandService";
import { AddressBookStore } from "../stores/addressBookStore";
import { ModelManager } from "../stores/modelManager";
import { formatResult, handleInput } from "./helpers";

const config = loadConfig();
const store = new AddressBookStore(config.dataFile);
const model = new ModelManager(store.load());
const service = new CommandService(model, store);

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout
});

console.log("\n" + "=".repeat(60));
console.log("Group Gradebook");
console.log("=".repeat(60));
console.log(`Loaded ${model.getFilteredPersonList().length} person(s) and ${model.getFilteredGroupList().length} group(s).`);
console.log("Type 'help' to see all commands.\n");

const ask = () => {
  rl.question("> ", (line: string) => {
    if (line.trim() === "") {
      ask();
      return;
    }

    const outcome = handleInput(service, line);
    console.log(formatResult(outcome) + "\n");

    if (outcome.ok && outcome.result.exit) {
      rl.close();
    } else {
      ask();
    }
  });
};

ask();
