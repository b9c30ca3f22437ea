import { useEffect } from "react";
import { Routes, Route, useLocation } from "react-router-dom";
import { Header } from "./components/Header";
import { StoryList } from "./components/StoryList";
import { StoryDetail } from "./components/StoryDetail";
import { About } from "./components/About";
import "./App.css";

function App() {
  const location = useLocation();

  useEffect(() => {
    const baseTitle = "Top Stories Reader";

    if (location.pathname === "/about") {
      document.title = `${baseTitle} - About`;
    } else if (location.pathname.startsWith("/item/")) {
      document.title = `${baseTitle} - Story`;
    } else {
      document.title = baseTitle;
    }
  }, [location.pathname]);

  return (
    <div id="page" className="container">
      <Header />
      <Routes>
        <Route
          path="/"
          element={
            <>
              <div className="menu row">
                <span className="comments span2">comments</span>
                <span className="points span1">points</span>
              </div>
              <div id="entries">
                <StoryList />
              </div>
            </>
          }
        />
        <Route path="/item/:id" element={<StoryDetail />} />
        <Route path="/about" element={<About />} />
      </Routes>
    </div>
  );
}

export default App;
