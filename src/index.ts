import { startConformanceApp } from "./bootstrap/conformance";

startConformanceApp();
