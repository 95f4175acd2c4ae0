import React from "react";
import ReactDOM from "react-dom/client";
import "./index.css";
import PuzzleLab from "./App";

const root = document.getElementById("root");
if (!root) throw new Error("#root element missing from index.html");

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <PuzzleLab />
  </React.StrictMode>
);
