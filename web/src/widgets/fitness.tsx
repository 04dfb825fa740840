import { createRoot } from "react-dom/client";
import { AppProvider } from "../app-context.js";
import { FitnessWidget } from "./fitness-widget.js";
import "../styles.css";

createRoot(document.getElementById("root")!).render(
  <AppProvider>
    <FitnessWidget />
  </AppProvider>,
);
