#!/usr/bin/env -S tsx --conditions=development
import { exec } from "./exec.js";

await exec();
