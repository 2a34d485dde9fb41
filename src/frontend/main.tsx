import { render } from "preact";
import { App } from "./App.tsx";
import "./style.css";

const appElement = document.getElementById("app");
if (appElement) {
  render(<App />, appElement);
}
