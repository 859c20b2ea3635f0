import { install } from "./app";

install();
